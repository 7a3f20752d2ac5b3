/**
 * Content extraction service
 *
 * Fetches web pages and reduces them to readable text: the page title
 * followed by the main content, one block per line. Tries common article
 * containers first and falls back to the whole body.
 *
 * Failed requests are retried with a linear backoff, except when the site
 * refuses access or the request times out.
 */

import * as cheerio from "cheerio";
import type { PageFetcher } from "../interfaces/content-sources";
import { FetchFailure, describeError } from "../errors";
import type { Logger } from "../logging/logger";
import { sleep as defaultSleep } from "../utils/retry";
import type { ExtractionConfig } from "./research-engine/config";

// Common content selectors (in priority order)
const CONTENT_SELECTORS = [
  "article",
  '[role="main"]',
  "main",
  ".post-content",
  ".article-content",
  ".entry-content",
  ".content",
  "#content",
  ".post",
  ".article",
];

const NOISE_SELECTORS = "script, style, noscript, nav, footer, header, aside, iframe, form";
const BLOCK_SELECTORS =
  "p, div, section, article, li, tr, blockquote, pre, h1, h2, h3, h4, h5, h6";

const MIN_MAIN_CONTENT_LENGTH = 100;

function blockText($: cheerio.CheerioAPI, selector: string): string {
  const root = $(selector).first();
  root.find("br").replaceWith("\n");
  root.find(BLOCK_SELECTORS).each((_, element) => {
    $(element).prepend("\n").append("\n");
  });

  return root
    .text()
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

/**
 * Extract the title and main content of an HTML page
 */
export function extractReadableText(html: string): string {
  const $ = cheerio.load(html);
  $(NOISE_SELECTORS).remove();

  const title =
    $("title").first().text().trim() ||
    $('meta[property="og:title"]').attr("content")?.trim() ||
    "";

  let body = "";
  for (const selector of CONTENT_SELECTORS) {
    const text = blockText($, selector);
    if (text.length > MIN_MAIN_CONTENT_LENGTH) {
      body = text;
      break;
    }
  }
  if (!body) {
    body = blockText($, "body");
  }

  if (!title || body.startsWith(title)) {
    return body;
  }
  return body ? `${title}\n\n${body}` : title;
}

interface HttpPageFetcherDeps {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export class HttpPageFetcher implements PageFetcher {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: ExtractionConfig,
    private readonly logger: Logger,
    deps: HttpPageFetcherDeps = {}
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Fetch a page and return its readable text
   *
   * @throws FetchFailure when every attempt fails
   */
  async fetchPage(url: string): Promise<string> {
    const attempts = Math.max(1, this.config.maxRetries);
    let lastError: FetchFailure | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.fetchOnce(url);
      } catch (error) {
        lastError =
          error instanceof FetchFailure
            ? error
            : new FetchFailure(url, describeError(error), { cause: error });

        // Don't retry on blocked or timeout (won't help)
        if (isBlocked(error) || isTimeout(error)) {
          throw lastError;
        }

        this.logger.warn("Page fetch attempt failed", {
          url,
          attempt,
          attempts,
          error: lastError.message,
        });
        if (attempt < attempts) {
          await this.sleep(this.config.retryDelayMs * attempt);
        }
      }
    }

    throw lastError ?? new FetchFailure(url, "Extraction failed after retries");
  }

  private async fetchOnce(url: string): Promise<string> {
    const response = await this.fetchImpl(url, {
      signal: AbortSignal.timeout(this.config.timeoutMs),
      headers: {
        "User-Agent": this.config.userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.9",
      },
    });

    if (!response.ok) {
      throw new BlockableFetchFailure(url, response.status, response.statusText);
    }

    const body = await response.text();
    const contentType = response.headers.get("content-type") ?? "";
    if (contentType && !contentType.includes("html")) {
      return body.trim();
    }
    return extractReadableText(body);
  }
}

class BlockableFetchFailure extends FetchFailure {
  constructor(
    url: string,
    readonly status: number,
    statusText: string
  ) {
    super(
      url,
      status === 401 || status === 403
        ? `Access denied (${status})`
        : `HTTP ${status}: ${statusText}`
    );
  }
}

function isBlocked(error: unknown): boolean {
  return error instanceof BlockableFetchFailure && (error.status === 401 || error.status === 403);
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}
