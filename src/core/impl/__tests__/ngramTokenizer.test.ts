import { describe, expect, it } from "vitest";
import { NGramTokenizer, ngrams } from "../../index.js";

describe("ngrams", () => {
  it("slides a two-character window left to right", () => {
    expect(ngrams("東京都", 2)).toEqual(["東京", "京都"]);
    expect(ngrams("abcd", 2)).toEqual(["ab", "bc", "cd"]);
  });

  it("yields len - n + 1 tokens of exactly n characters", () => {
    const text = "大阪府大阪市北区";
    for (const n of [1, 2, 3, 8]) {
      const grams = ngrams(text, n);
      expect(grams).toHaveLength(text.length - n + 1);
      for (const g of grams) expect(Array.from(g)).toHaveLength(n);
    }
  });

  it("returns nothing when the text is shorter than n", () => {
    expect(ngrams("", 2)).toEqual([]);
    expect(ngrams("都", 2)).toEqual([]);
    expect(ngrams("ab", 3)).toEqual([]);
  });

  it("keeps repeated grams in order of occurrence", () => {
    expect(ngrams("aaa", 2)).toEqual(["aa", "aa"]);
  });

  it("counts surrogate pairs as one character", () => {
    // "𠮷" is outside the BMP and takes two UTF-16 code units
    expect(ngrams("𠮷野家", 2)).toEqual(["𠮷野", "野家"]);
    expect(ngrams("𠮷", 2)).toEqual([]);
  });

  it("rejects widths that are not positive integers", () => {
    expect(() => new NGramTokenizer(0)).toThrow(RangeError);
    expect(() => new NGramTokenizer(1.5)).toThrow(RangeError);
  });
});

describe("NGramTokenizer", () => {
  it("defaults to width 2 and can be re-run on the same input", () => {
    const tok = new NGramTokenizer();
    expect(tok.width).toBe(2);
    expect(Array.from(tok.tokenize("新宿区"))).toEqual(["新宿", "宿区"]);
    expect(Array.from(tok.tokenize("新宿区"))).toEqual(["新宿", "宿区"]);
  });
});
