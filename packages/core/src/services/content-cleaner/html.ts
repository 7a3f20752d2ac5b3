import * as cheerio from "cheerio";

const BOILERPLATE_SELECTORS =
  "script, style, nav, header, footer, aside, .ads, .ad, .advertisement, .menu, .popup, .cookie";

export function looksLikeHtml(content: string): boolean {
  const lower = content.toLowerCase();
  return lower.includes("<html") || lower.includes("<body");
}

/**
 * Drop boilerplate elements and return the page text, one text run per line
 */
export function stripHtml(html: string): string {
  const $ = cheerio.load(html);
  $(BOILERPLATE_SELECTORS).remove();

  const root = $("body");
  root.find("*").each((_, element) => {
    $(element).before("\n").after("\n");
  });

  return root
    .text()
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n");
}
