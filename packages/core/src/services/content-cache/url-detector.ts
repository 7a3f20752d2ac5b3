/**
 * Detect URLs that point at PDF documents rather than HTML pages
 *
 * True when the path ends in .pdf, or when the query string mentions pdf
 * and carries pdf=true (dynamic endpoints that render a PDF).
 */
export function isPdfUrl(url: string): boolean {
  let pathname: string;
  let search: string;
  try {
    const parsed = new URL(url);
    pathname = parsed.pathname.toLowerCase();
    search = parsed.search.toLowerCase();
  } catch {
    const [beforeQuery, query = ""] = url.split("?", 2);
    pathname = beforeQuery.toLowerCase();
    search = query.toLowerCase();
  }

  if (pathname.endsWith(".pdf")) {
    return true;
  }

  return search.includes("pdf") && search.includes("pdf=true");
}
