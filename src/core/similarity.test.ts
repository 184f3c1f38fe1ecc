import { describe, it, expect } from "vitest";
import { matchingCharacters, titleSimilarity } from "./similarity.js";

describe("titleSimilarity", () => {
  it("treats a headline with an inserted word as a near duplicate", () => {
    expect(titleSimilarity("Fed Raises Rates Again", "Fed Raises Interest Rates Again")).toBe(1);
  });

  it("ignores case and runs of whitespace", () => {
    expect(titleSimilarity("Markets  Rally", "markets rally")).toBe(1);
  });

  it("scores unrelated headlines low", () => {
    expect(titleSimilarity("Oil prices slump", "Gold hits record")).toBe(0.25);
  });

  it("is symmetric in its arguments", () => {
    const a = "ECB holds rates steady";
    const b = "ECB holds key rates steady in June";
    expect(titleSimilarity(a, b)).toBe(titleSimilarity(b, a));
  });

  it("does not equate a short title with a longer one that contains it", () => {
    // 10 matching characters against 10 + 57
    expect(
      titleSimilarity("Oil prices", "Oil prices slump after OPEC agrees record output increase"),
    ).toBeCloseTo(20 / 67);
  });

  it("handles empty titles", () => {
    expect(titleSimilarity("", "")).toBe(1);
    expect(titleSimilarity("", "Anything")).toBe(0);
  });
});

describe("matchingCharacters", () => {
  it("sums the longest block and the blocks on either side of it", () => {
    // "abxcd" vs "abycd": blocks "ab" and "cd"
    expect(matchingCharacters("abxcd", "abycd")).toBe(4);
  });

  it("returns 0 without a common character", () => {
    expect(matchingCharacters("abc", "xyz")).toBe(0);
  });
});
