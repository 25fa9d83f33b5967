import { describe, it, expect } from "vitest";

import { SourceLines } from "./source.js";

const at = (line: number, column: number) => ({
  offset: 0,
  length: 1,
  line,
  column,
});

describe("SourceLines", () => {
  it("should split on every line ending", () => {
    const lines = new SourceLines("a\r\nb\rc\nd");
    expect([1, 2, 3, 4].map((line) => lines.line(line))).toEqual([
      "a",
      "b",
      "c",
      "d",
    ]);
  });

  it("should read past the end as empty", () => {
    expect(new SourceLines("a").line(5)).toBe("");
  });

  it("should read the rest of a line from a location", () => {
    expect(new SourceLines("x = 1\ny = foo(2)").from(at(2, 4))).toBe(
      "foo(2)",
    );
  });

  describe("hexDigitsAt", () => {
    const lines = new SourceLines("x = 0xDeadBeef + 0XFF + 12\ny = 0x");

    it("should return the digits as written", () => {
      expect(lines.hexDigitsAt(at(1, 4))).toBe("DeadBeef");
    });

    it("should only recognize a lowercase prefix", () => {
      expect(lines.hexDigitsAt(at(1, 17))).toBeUndefined();
    });

    it("should ignore decimal literals", () => {
      expect(lines.hexDigitsAt(at(1, 24))).toBeUndefined();
    });

    it("should return no digits for a bare prefix", () => {
      expect(lines.hexDigitsAt(at(2, 4))).toBe("");
    });

    it("should need a location", () => {
      expect(lines.hexDigitsAt(null)).toBeUndefined();
    });
  });
});
