/**
 * Content cleaner
 *
 * Turns raw page text (or HTML) into readable prose: boilerplate elements are
 * stripped, the text is cut into blocks, each block is cleaned by the LLM
 * through a bounded worker pool and the results are stitched back together
 * in their original order.
 */

import type { LLMProvider } from "../../interfaces/llm-provider";
import { errorFields, type Logger } from "../../logging/logger";
import { mapWithConcurrency } from "../../utils/concurrency";
import type { CleanerConfig } from "../research-engine/config";
import { reassembleBlocks, splitIntoBlocks } from "./blocks";
import { looksLikeHtml, stripHtml } from "./html";

export class ContentCleaner {
  constructor(
    private readonly llm: LLMProvider,
    private readonly config: CleanerConfig,
    private readonly logger: Logger
  ) {}

  /**
   * Clean page content, keeping what matters for `task` when one is given
   */
  async clean(content: string, task?: string): Promise<string> {
    let text = content;
    if (looksLikeHtml(text)) {
      this.logger.debug("Content looks like HTML, stripping markup");
      text = this.preprocessHtml(text);
    }

    const blocks = splitIntoBlocks(text, this.config.blockSize);
    this.logger.info("Content split into blocks", { blocks: blocks.length });

    let completed = 0;
    const cleaned = await mapWithConcurrency(blocks, this.config.maxWorkers, async (block, i) => {
      const result = await this.cleanBlock(block, i, task);
      completed++;
      if (completed % 5 === 0 || completed === blocks.length) {
        this.logger.debug("Cleaning progress", { completed, total: blocks.length });
      }
      return result;
    });

    return reassembleBlocks(cleaned, this.config);
  }

  private preprocessHtml(html: string): string {
    try {
      return stripHtml(html);
    } catch (error) {
      this.logger.error("HTML preprocessing failed, keeping raw content", errorFields(error));
      return html;
    }
  }

  private async cleanBlock(block: string, index: number, task?: string): Promise<string> {
    if (!block.trim()) {
      return "";
    }
    try {
      return (await this.llm.cleanBlock(block, task)).trim();
    } catch (error) {
      this.logger.error("Block cleaning failed, keeping original text", {
        block: index,
        ...errorFields(error),
      });
      return block;
    }
  }
}
