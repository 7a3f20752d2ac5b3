/**
 * Sentence-aware text splitter
 *
 * Packs whole sentences into chunks of at most `chunkSize` characters and
 * repeats trailing sentences (up to `chunkOverlap` characters) at the start
 * of the next chunk. A sentence longer than a chunk is cut at the size.
 */

export interface SplitOptions {
  chunkSize: number; // characters
  chunkOverlap: number; // characters
}

function toSentences(text: string, chunkSize: number): string[] {
  const sentences = text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);

  const pieces: string[] = [];
  for (const sentence of sentences) {
    for (let i = 0; i < sentence.length; i += chunkSize) {
      pieces.push(sentence.slice(i, i + chunkSize));
    }
  }
  return pieces;
}

function joinedLength(parts: string[]): number {
  return parts.reduce((total, part, i) => total + part.length + (i > 0 ? 1 : 0), 0);
}

function trailingOverlap(parts: string[], chunkOverlap: number): string[] {
  const carried: string[] = [];
  for (let i = parts.length - 1; i >= 0; i--) {
    if (joinedLength([parts[i], ...carried]) > chunkOverlap) {
      break;
    }
    carried.unshift(parts[i]);
  }
  return carried;
}

export function splitText(text: string, options: SplitOptions): string[] {
  const trimmed = text.trim();
  if (!trimmed) {
    return [];
  }
  if (trimmed.length <= options.chunkSize) {
    return [trimmed];
  }

  const chunks: string[] = [];
  let current: string[] = [];

  for (const piece of toSentences(trimmed, options.chunkSize)) {
    if (current.length > 0 && joinedLength([...current, piece]) > options.chunkSize) {
      chunks.push(current.join(" "));
      current = trailingOverlap(current, options.chunkOverlap);
      if (joinedLength([...current, piece]) > options.chunkSize) {
        current = [];
      }
    }
    current.push(piece);
  }

  if (current.length > 0) {
    chunks.push(current.join(" "));
  }
  return chunks;
}
