/**
 * Token estimation utilities
 *
 * These are approximate estimates based on typical tokenization ratios.
 * Actual token counts may vary depending on the specific content and model.
 */

/**
 * Average ~4 characters per token for English text
 */
export const CHARS_PER_TOKEN = 4;

/**
 * Character budget that corresponds to a token budget
 */
export function tokensToChars(tokens: number): number {
  return tokens * CHARS_PER_TOKEN;
}
