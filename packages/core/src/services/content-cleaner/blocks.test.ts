import { describe, it, expect } from "vitest";
import { normalizeWhitespace, reassembleBlocks, splitIntoBlocks } from "./blocks";

const reassembly = { maxOverlapWindow: 100, minOverlap: 10 };

describe("normalizeWhitespace", () => {
  it("collapses blank-line runs and repeated spaces", () => {
    expect(normalizeWhitespace("a  b\n \n\n c")).toBe("a b\n\n c");
  });
});

describe("splitIntoBlocks", () => {
  it("returns nothing for empty content", () => {
    expect(splitIntoBlocks("", 5000)).toEqual([]);
  });

  it("keeps content up to one and a half blocks whole", () => {
    expect(splitIntoBlocks("x".repeat(7500), 5000)).toEqual(["x".repeat(7500)]);
  });

  it("carries the last two sentences into the next block", () => {
    const content = ["One. Two. Three.", "x".repeat(40), "y".repeat(40)].join("\n\n");

    expect(splitIntoBlocks(content, 50)).toEqual([
      "One. Two. Three.",
      "Two. Three." + "x".repeat(40),
      "Two. Three." + "y".repeat(40),
    ]);
  });
});

describe("reassembleBlocks", () => {
  it("merges blocks that share a long enough seam", () => {
    const merged = reassembleBlocks(
      ["Intro text. The shared sentence here.", "The shared sentence here. Next part."],
      reassembly
    );
    expect(merged).toBe("Intro text. The shared sentence here. Next part.");
  });

  it("joins blocks with a blank line when the seam is short", () => {
    expect(reassembleBlocks(["First block ends.", "s. Second block."], reassembly)).toBe(
      "First block ends.\n\ns. Second block."
    );
  });

  it("returns an empty string for no blocks", () => {
    expect(reassembleBlocks([], reassembly)).toBe("");
  });

  it("skips blocks that cleaned to nothing", () => {
    expect(reassembleBlocks(["", "Second block text", "", "Third"], reassembly)).toBe(
      "Second block text\n\nThird"
    );
    expect(reassembleBlocks(["", "  "], reassembly)).toBe("");
  });
});
