import { describe, it, expect } from "vitest";
import { splitText } from "./text-splitter";

describe("splitText", () => {
  it("keeps short text as one chunk", () => {
    expect(splitText("  Solar credits rose.  ", { chunkSize: 100, chunkOverlap: 10 })).toEqual([
      "Solar credits rose.",
    ]);
  });

  it("returns nothing for blank text", () => {
    expect(splitText(" \n ", { chunkSize: 100, chunkOverlap: 10 })).toEqual([]);
  });

  it("repeats trailing sentences that fit in the overlap", () => {
    expect(splitText("One. Two. Three.", { chunkSize: 12, chunkOverlap: 5 })).toEqual([
      "One. Two.",
      "Two. Three.",
    ]);
  });

  it("drops the overlap when it would overflow the next chunk", () => {
    expect(splitText("One. Two. Three.", { chunkSize: 10, chunkOverlap: 5 })).toEqual([
      "One. Two.",
      "Three.",
    ]);
  });

  it("cuts sentences longer than a chunk", () => {
    expect(splitText("abcdefghij", { chunkSize: 4, chunkOverlap: 0 })).toEqual([
      "abcd",
      "efgh",
      "ij",
    ]);
  });
});
