import { describe, it, expect, vi } from "vitest";
import { ContentCleaner } from "./content-cleaner";
import { stripHtml } from "./html";
import { fakeLLM } from "../../test-utils/fakes";
import { createSilentLogger } from "../../logging/logger";
import { DEFAULT_CONFIG } from "../research-engine/config";

const delays: Record<string, number> = { a: 30, b: 20, c: 10, d: 0 };

function fourBlockPage(): string {
  return ["a", "b", "c", "d"].map((letter) => letter.repeat(3000)).join("\n\n");
}

describe("stripHtml", () => {
  it("drops boilerplate and puts each text run on its own line", () => {
    const html =
      '<html><head><title>T</title></head><body><nav>Menu</nav><div class="ad">Buy now</div>' +
      "<p>Solar credits rose.</p><p>Second <b>bold</b> line.</p><script>track()</script></body></html>";

    expect(stripHtml(html)).toBe("Solar credits rose.\nSecond\nbold\nline.");
  });
});

describe("ContentCleaner", () => {
  it("keeps block order when blocks finish out of order", async () => {
    const cleanBlock = vi.fn(async (text: string) => {
      await new Promise((resolve) => setTimeout(resolve, delays[text[0]]));
      return text[0].toUpperCase().repeat(3);
    });
    const cleaner = new ContentCleaner(
      fakeLLM({ cleanBlock }),
      DEFAULT_CONFIG.cleaner,
      createSilentLogger()
    );

    const result = await cleaner.clean(fourBlockPage(), "solar incentives");

    expect(result).toBe("AAA\n\nBBB\n\nCCC\n\nDDD");
    expect(cleanBlock).toHaveBeenCalledWith("a".repeat(3000), "solar incentives");
  });

  it("keeps a block unmodified when cleaning it fails", async () => {
    const cleanBlock = vi.fn(async (text: string) => {
      if (text.startsWith("b")) {
        throw new Error("context length exceeded");
      }
      return text[0].toUpperCase().repeat(3);
    });
    const cleaner = new ContentCleaner(
      fakeLLM({ cleanBlock }),
      DEFAULT_CONFIG.cleaner,
      createSilentLogger()
    );

    const result = await cleaner.clean(fourBlockPage());

    expect(result).toBe(`AAA\n\n${"b".repeat(3000)}\n\nCCC\n\nDDD`);
  });

  it("never runs more blocks at once than the worker limit", async () => {
    let running = 0;
    let peak = 0;
    const cleanBlock = vi.fn(async (text: string) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return text;
    });
    const cleaner = new ContentCleaner(
      fakeLLM({ cleanBlock }),
      { ...DEFAULT_CONFIG.cleaner, maxWorkers: 2 },
      createSilentLogger()
    );

    await cleaner.clean(fourBlockPage());

    expect(cleanBlock).toHaveBeenCalledTimes(4);
    expect(peak).toBe(2);
  });

  it("cleans short text as a single block", async () => {
    const llm = fakeLLM({ cleanBlock: vi.fn().mockResolvedValue("  Clean text.  ") });
    const cleaner = new ContentCleaner(llm, DEFAULT_CONFIG.cleaner, createSilentLogger());

    expect(await cleaner.clean("Menu | Home\n\nClean text.")).toBe("Clean text.");
    expect(llm.cleanBlock).toHaveBeenCalledTimes(1);
  });
});
