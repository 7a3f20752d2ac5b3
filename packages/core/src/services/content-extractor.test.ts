import { describe, it, expect, vi } from "vitest";
import { HttpPageFetcher, extractReadableText } from "./content-extractor";
import { FetchFailure } from "../errors";
import { createSilentLogger } from "../logging/logger";
import type { ExtractionConfig } from "./research-engine/config";

const config: ExtractionConfig = {
  timeoutMs: 5000,
  userAgent: "test-agent",
  maxRetries: 2,
  retryDelayMs: 1000,
};

const ARTICLE_PAGE = [
  "<html><head><title>Solar Guide</title></head><body>",
  "<nav>Home | About</nav>",
  "<article><h1>Solar Guide</h1>",
  "<p>Residential solar credits cover thirty percent of installation costs in most states this year.</p>",
  "<p>Battery storage qualifies when it is charged by the panels themselves.</p>",
  "</article><footer>Copyright</footer></body></html>",
].join("");

function htmlResponse(html: string): Response {
  return new Response(html, { status: 200, headers: { "Content-Type": "text/html; charset=utf-8" } });
}

describe("extractReadableText", () => {
  it("keeps the main article, one block per line", () => {
    expect(extractReadableText(ARTICLE_PAGE)).toBe(
      [
        "Solar Guide",
        "Residential solar credits cover thirty percent of installation costs in most states this year.",
        "Battery storage qualifies when it is charged by the panels themselves.",
      ].join("\n")
    );
  });

  it("falls back to the body and puts the title first", () => {
    const html =
      "<html><head><title>Short note</title></head><body><div>Tiny page text.</div><p>Second line.</p></body></html>";

    expect(extractReadableText(html)).toBe("Short note\n\nTiny page text.\nSecond line.");
  });
});

describe("HttpPageFetcher", () => {
  it("returns the readable text of an html page", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(htmlResponse(ARTICLE_PAGE));
    const fetcher = new HttpPageFetcher(config, createSilentLogger(), { fetchImpl });

    const text = await fetcher.fetchPage("https://example.org/solar");

    expect(text.split("\n")[0]).toBe("Solar Guide");
    expect(fetchImpl.mock.calls[0][0]).toBe("https://example.org/solar");
  });

  it("returns non-html bodies as trimmed text", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response("  plain notes \n", { headers: { "Content-Type": "text/plain" } }));
    const fetcher = new HttpPageFetcher(config, createSilentLogger(), { fetchImpl });

    expect(await fetcher.fetchPage("https://example.org/notes.txt")).toBe("plain notes");
  });

  it("retries a failed request after the configured delay", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response("oops", { status: 500, statusText: "Internal Server Error" }))
      .mockResolvedValueOnce(htmlResponse(ARTICLE_PAGE));
    const sleep = vi.fn(async () => undefined);
    const fetcher = new HttpPageFetcher(config, createSilentLogger(), { fetchImpl, sleep });

    await fetcher.fetchPage("https://example.org/solar");

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it("does not retry when access is denied", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response("no", { status: 403 }));
    const fetcher = new HttpPageFetcher(config, createSilentLogger(), { fetchImpl });

    await expect(fetcher.fetchPage("https://example.org/private")).rejects.toThrow(
      "Access denied (403)"
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("throws a FetchFailure once every attempt has failed", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockImplementation(async () => new Response("oops", { status: 500, statusText: "Internal Server Error" }));
    const fetcher = new HttpPageFetcher(config, createSilentLogger(), {
      fetchImpl,
      sleep: async () => undefined,
    });

    const failure = await fetcher.fetchPage("https://example.org/down").catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(FetchFailure);
    expect(failure).toMatchObject({ url: "https://example.org/down", message: "HTTP 500: Internal Server Error" });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });
});
