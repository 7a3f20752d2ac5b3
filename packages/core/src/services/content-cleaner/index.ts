export { ContentCleaner } from "./content-cleaner";
export { splitIntoBlocks, reassembleBlocks, normalizeWhitespace } from "./blocks";
export { stripHtml, looksLikeHtml } from "./html";
