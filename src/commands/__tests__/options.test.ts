import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { parseList, parsePort, parsePositiveInt } from "../options.js";

describe("option parsers", () => {
  it("splits comma lists and drops blanks", () => {
    expect(parseList(" 都道府県, ,町域 ")).toEqual(["都道府県", "町域"]);
  });

  it("accepts positive integers only", () => {
    expect(parsePositiveInt("5")).toBe(5);
    expect(() => parsePositiveInt("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("2.5")).toThrow(InvalidArgumentError);
  });

  it("accepts ports from 0 to 65535", () => {
    expect(parsePort("8080")).toBe(8080);
    expect(parsePort("0")).toBe(0);
    expect(parsePort("65535")).toBe(65535);
  });

  it("rejects ports outside the range or not numeric", () => {
    for (const bad of ["abc", "", "-1", "65536", "80.5"]) {
      expect(() => parsePort(bad)).toThrow(InvalidArgumentError);
    }
  });
});
