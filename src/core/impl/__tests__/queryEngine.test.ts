import { describe, expect, it } from "vitest";
import { buildIndex, intersectSorted, NGramQueryEngine, ngrams, search, searchableText, type CorpusRecord } from "../../index.js";

const corpus: CorpusRecord[] = [
  { id: 0, fields: { pref: "東京都", city: "新宿区" } },
  { id: 1, fields: { pref: "大阪府", city: "大阪市" } },
];
const fields = ["pref", "city"];
const index = buildIndex(corpus, fields);

describe("search", () => {
  it("matches records containing every query gram", () => {
    expect(search("東京都", index)).toEqual(new Set([0]));
    expect(search("大阪", index)).toEqual(new Set([1]));
  });

  it("matches across a field boundary", () => {
    expect(search("都新", index)).toEqual(new Set([0]));
    expect(search("京都新宿", index)).toEqual(new Set([0]));
  });

  it("returns nothing for grams absent from the index", () => {
    expect(search("沖縄", index)).toEqual(new Set());
    expect(search("都区", index)).toEqual(new Set());
    expect(search("東京沖縄", index)).toEqual(new Set());
  });

  it("returns nothing for queries shorter than two characters", () => {
    expect(search("", index)).toEqual(new Set());
    expect(search("東", index)).toEqual(new Set());
    expect(search("大", index)).toEqual(new Set());
  });

  it("requires all grams, not any", () => {
    // both grams exist, but in different records
    expect(search("東京", index)).toEqual(new Set([0]));
    expect(search("阪市", index)).toEqual(new Set([1]));
    expect(search("東京阪市", index)).toEqual(new Set());
  });

  it("is a set match, not a phrase match", () => {
    // grams 大阪, 阪大: 阪大 never occurs
    expect(search("大阪大阪", index)).toEqual(new Set());
    // "府大阪" -> 府大, 大阪: both in record 1
    expect(search("府大阪", index)).toEqual(new Set([1]));
  });
});

describe("NGramQueryEngine.match", () => {
  const many: CorpusRecord[] = [
    { id: 0, fields: { town: "中央町" } },
    { id: 1, fields: { town: "本町" } },
    { id: 2, fields: { town: "中央区中央" } },
    { id: 3, fields: { town: "中央" } },
  ];
  const idx = buildIndex(many, ["town"]);
  const engine = new NGramQueryEngine();

  it("returns ids in ascending order", () => {
    expect(engine.match("中央", idx)).toEqual([0, 2, 3]);
  });

  it("agrees with a brute-force substring-gram scan", () => {
    for (const q of ["中央", "央町", "中央町", "本町", "町", "央区中", "区中央"]) {
      const grams = ngrams(q, 2);
      const expected = many
        .filter((r) => grams.length > 0 && grams.every((g) => searchableText(r, ["town"]).includes(g)))
        .map((r) => r.id);
      expect(engine.match(q, idx)).toEqual(expected);
    }
  });
});

describe("intersectSorted", () => {
  it("merge-joins ascending lists", () => {
    expect(intersectSorted([1, 3, 5, 7], [2, 3, 4, 7, 9])).toEqual([3, 7]);
    expect(intersectSorted([], [1, 2])).toEqual([]);
    expect(intersectSorted([1, 2], [3, 4])).toEqual([]);
  });
});
