/**
 * Block splitting and reassembly for the content cleaner
 */

export function normalizeWhitespace(content: string): string {
  return content.replace(/\n\s*\n/g, "\n\n").replace(/ +/g, " ");
}

function lastSentences(text: string, count: number): string {
  const sentences = text.match(/[^.!?]*[.!?]/g) ?? [];
  return sentences.length >= count ? sentences.slice(-count).join("") : "";
}

/**
 * Split normalized text into blocks of roughly `blockSize` characters.
 *
 * Paragraphs are packed greedily. When a block is flushed, its last two
 * sentences open the next block so the model sees some context across the
 * cut; reassembly removes the duplicate afterward.
 */
export function splitIntoBlocks(content: string, blockSize: number): string[] {
  if (!content) {
    return [];
  }

  const text = normalizeWhitespace(content);
  if (text.length <= blockSize * 1.5) {
    return [text];
  }

  const blocks: string[] = [];
  let current = "";

  for (const paragraph of text.split(/\n\n+/)) {
    if (current && current.length + paragraph.length > blockSize) {
      blocks.push(current.trim());
      current = lastSentences(current, 2) + paragraph;
    } else {
      current = current ? `${current}\n\n${paragraph}` : paragraph;
    }
  }

  if (current.trim()) {
    blocks.push(current.trim());
  }
  return blocks;
}

export interface ReassemblyOptions {
  maxOverlapWindow: number;
  minOverlap: number;
}

/**
 * Join cleaned blocks in order, merging a block into the text before it when
 * the tail of one equals the head of the next over more than `minOverlap`
 * characters; otherwise blocks are separated by a blank line. Blocks that
 * cleaned to nothing are dropped.
 */
export function reassembleBlocks(blocks: string[], options: ReassemblyOptions): string {
  const kept = blocks.filter((block) => block.trim() !== "");
  if (kept.length === 0) {
    return "";
  }

  let assembled = kept[0];
  for (const block of kept.slice(1)) {
    const window = Math.min(options.maxOverlapWindow, assembled.length, block.length);

    let overlap = 0;
    for (let j = 1; j < window; j++) {
      if (assembled.slice(-j) === block.slice(0, j)) {
        overlap = j;
      }
    }

    assembled =
      overlap > options.minOverlap
        ? assembled.slice(0, -overlap) + block
        : `${assembled}\n\n${block}`;
  }
  return assembled;
}
