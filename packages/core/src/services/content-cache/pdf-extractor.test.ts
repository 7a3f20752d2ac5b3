import { describe, it, expect, vi } from "vitest";
import { PdfTextExtractor } from "./pdf-extractor";
import { createSilentLogger } from "../../logging/logger";
import { DEFAULT_CONFIG } from "../research-engine/config";

function okResponse(): Response {
  return new Response(new Uint8Array([37, 80, 68, 70]), { status: 200 });
}

describe("PdfTextExtractor", () => {
  it("joins page texts with blank lines", async () => {
    const destroy = vi.fn().mockResolvedValue(undefined);
    const extractor = new PdfTextExtractor(DEFAULT_CONFIG.extraction, createSilentLogger(), {
      fetchImpl: vi.fn().mockResolvedValue(okResponse()),
      parserFactory: () => ({
        getText: async () => ({
          text: "ignored",
          pages: [{ text: " Page one. " }, { text: "Page two." }],
        }),
        destroy,
      }),
    });

    const text = await extractor.extractText("https://example.org/brief.pdf");

    expect(text).toBe("Page one.\n\nPage two.");
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it("returns empty text when the download fails", async () => {
    const parserFactory = vi.fn();
    const extractor = new PdfTextExtractor(DEFAULT_CONFIG.extraction, createSilentLogger(), {
      fetchImpl: vi.fn().mockResolvedValue(new Response("missing", { status: 404 })),
      parserFactory,
    });

    expect(await extractor.extractText("https://example.org/missing.pdf")).toBe("");
    expect(parserFactory).not.toHaveBeenCalled();
  });

  it("returns empty text when parsing throws", async () => {
    const extractor = new PdfTextExtractor(DEFAULT_CONFIG.extraction, createSilentLogger(), {
      fetchImpl: vi.fn().mockResolvedValue(okResponse()),
      parserFactory: () => ({
        getText: async () => {
          throw new Error("Invalid PDF structure");
        },
        destroy: async () => undefined,
      }),
    });

    expect(await extractor.extractText("https://example.org/broken.pdf")).toBe("");
  });

  it("returns empty text when the parser cannot be created", async () => {
    const extractor = new PdfTextExtractor(DEFAULT_CONFIG.extraction, createSilentLogger(), {
      fetchImpl: vi.fn().mockResolvedValue(okResponse()),
      parserFactory: () => {
        throw new Error("bad pdf");
      },
    });

    expect(await extractor.extractText("https://example.org/bad.pdf")).toBe("");
  });
});
