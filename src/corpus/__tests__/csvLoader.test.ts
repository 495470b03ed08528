import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { loadCorpus, parseCorpus } from "../csvLoader.js";
import { decodeWithFallback } from "../encoding.js";
import { CorpusEncodingError, CorpusFormatError } from "../errors.js";

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "address-corpus-"));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseCorpus", () => {
  it("maps header names to cells and numbers rows from zero", () => {
    const records = parseCorpus(["郵便番号,都道府県,市区町村", "1600022,東京都,新宿区", "5300001,大阪府,大阪市"].join("\n"));
    expect(records).toEqual([
      { id: 0, fields: { 郵便番号: "1600022", 都道府県: "東京都", 市区町村: "新宿区" } },
      { id: 1, fields: { 郵便番号: "5300001", 都道府県: "大阪府", 市区町村: "大阪市" } },
    ]);
  });

  it("skips blank lines and keeps empty cells as empty strings", () => {
    const records = parseCorpus("a,b\n\n1,\n");
    expect(records).toEqual([{ id: 0, fields: { a: "1", b: "" } }]);
  });

  it("tolerates short rows", () => {
    const records = parseCorpus("a,b,c\n1,2\n");
    expect(records[0]?.fields).toEqual({ a: "1", b: "2" });
  });

  it("strips a byte-order mark from the header", () => {
    const records = parseCorpus("\uFEFFpref\n東京都\n");
    expect(records[0]?.fields).toEqual({ pref: "東京都" });
  });

  it("handles quoted cells with commas", () => {
    const records = parseCorpus('name,addr\n"本社","千代田区丸の内1-1, 2F"\n');
    expect(records[0]?.fields.addr).toBe("千代田区丸の内1-1, 2F");
  });

  it("rejects an unterminated quote", () => {
    expect(() => parseCorpus('a,b\n"1,2\n', "bad.csv")).toThrow(CorpusFormatError);
  });
});

describe("decodeWithFallback", () => {
  // 東京 in Shift_JIS
  const sjis = Uint8Array.from([0x93, 0x8c, 0x8b, 0x9e]);

  it("uses the first encoding that decodes cleanly", () => {
    const utf8 = new TextEncoder().encode("東京");
    expect(decodeWithFallback(utf8, ["utf-8", "shift_jis"])).toEqual({ text: "東京", encoding: "utf-8" });
  });

  it("falls through to the next candidate on invalid bytes", () => {
    expect(decodeWithFallback(sjis, ["utf-8", "shift_jis"])).toEqual({ text: "東京", encoding: "shift_jis" });
  });

  it("skips unknown encoding labels", () => {
    expect(decodeWithFallback(sjis, ["no-such-encoding", "shift_jis"]).encoding).toBe("shift_jis");
  });

  it("lists every attempt when nothing decodes", () => {
    const attempt = () => decodeWithFallback(sjis, ["utf-8", "no-such-encoding"], "zenkoku.csv");
    expect(attempt).toThrow(CorpusEncodingError);
    expect(attempt).toThrow('unable to decode corpus "zenkoku.csv" with any of: utf-8, no-such-encoding');
  });
});

describe("loadCorpus", () => {
  it("reads a UTF-8 file", async () => {
    const file = join(dir, "utf8.csv");
    writeFileSync(file, "都道府県,市区町村\n東京都,新宿区\n");

    const { records, encoding } = await loadCorpus(file);
    expect(encoding).toBe("utf-8");
    expect(records).toEqual([{ id: 0, fields: { 都道府県: "東京都", 市区町村: "新宿区" } }]);
  });

  it("reads a Shift_JIS file through the fallback chain", async () => {
    const file = join(dir, "sjis.csv");
    const header = new TextEncoder().encode("pref\n");
    writeFileSync(file, Buffer.concat([header, Buffer.from([0x93, 0x8c, 0x8b, 0x9e, 0x0a])]));

    const { records, encoding } = await loadCorpus(file);
    expect(encoding).toBe("shift_jis");
    expect(records).toEqual([{ id: 0, fields: { pref: "東京" } }]);
  });

  it("propagates a missing file", async () => {
    await expect(loadCorpus(join(dir, "missing.csv"))).rejects.toMatchObject({ code: "ENOENT" });
  });
});
