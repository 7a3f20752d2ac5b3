/**
 * Content cache module
 */

export { ContentCache, type ContentCacheOptions, type FetchFn } from "./content-cache";
export { PdfTextExtractor } from "./pdf-extractor";
export { isPdfUrl } from "./url-detector";
