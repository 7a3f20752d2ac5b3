import { describe, it, expect } from "vitest";
import { isPdfUrl } from "./url-detector";

describe("isPdfUrl", () => {
  it("detects a .pdf path regardless of case", () => {
    expect(isPdfUrl("https://example.org/reports/annual.PDF")).toBe(true);
  });

  it("detects dynamic endpoints that render a pdf", () => {
    expect(isPdfUrl("https://example.org/render?id=7&pdf=true")).toBe(true);
  });

  it("ignores query strings that only mention pdf", () => {
    expect(isPdfUrl("https://example.org/render?format=pdf")).toBe(false);
  });

  it("treats html pages as non-pdf", () => {
    expect(isPdfUrl("https://example.org/articles/solar.html")).toBe(false);
  });

  it("falls back to string splitting for relative urls", () => {
    expect(isPdfUrl("/files/brief.pdf?download=1")).toBe(true);
  });
});
