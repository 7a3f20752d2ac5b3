import { PDFParse } from "pdf-parse";
import type { DocumentTextExtractor } from "../../interfaces/content-sources";
import { errorFields, type Logger } from "../../logging/logger";
import type { ExtractionConfig } from "../research-engine/config";

interface ParserLike {
  getText(): Promise<{ text: string; pages: { text: string }[] }>;
  destroy(): Promise<void>;
}

interface PdfTextExtractorDeps {
  parserFactory?: (data: Uint8Array) => ParserLike;
  fetchImpl?: typeof fetch;
}

/**
 * Downloads a PDF and extracts its text with pdf-parse, pages separated
 * by blank lines.
 * Any failure resolves to "" so the caller's loop keeps going.
 */
export class PdfTextExtractor implements DocumentTextExtractor {
  private readonly parserFactory: (data: Uint8Array) => ParserLike;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: ExtractionConfig,
    private readonly logger: Logger,
    deps?: PdfTextExtractorDeps
  ) {
    this.parserFactory = deps?.parserFactory ?? ((data) => new PDFParse({ data }));
    this.fetchImpl = deps?.fetchImpl ?? fetch;
  }

  async extractText(url: string): Promise<string> {
    let data: Uint8Array;
    try {
      const response = await this.fetchImpl(url, {
        headers: { "User-Agent": this.config.userAgent, Accept: "application/pdf" },
        signal: AbortSignal.timeout(this.config.timeoutMs * 3),
      });
      if (!response.ok) {
        this.logger.warn("PDF download failed", { url, status: response.status });
        return "";
      }
      data = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      this.logger.warn("PDF download failed", { url, ...errorFields(error) });
      return "";
    }

    let parser: ParserLike | undefined;
    try {
      parser = this.parserFactory(data);
      const result = await parser.getText();
      const text = (
        result.pages.length > 0
          ? result.pages.map((page) => page.text.trim()).join("\n\n")
          : result.text
      ).trim();
      this.logger.info("Extracted PDF text", { url, length: text.length });
      return text;
    } catch (error) {
      this.logger.warn("PDF text extraction failed", { url, ...errorFields(error) });
      return "";
    } finally {
      await parser?.destroy().catch((error: unknown) => {
        this.logger.debug("PDF parser cleanup failed", { url, ...errorFields(error) });
      });
    }
  }
}
