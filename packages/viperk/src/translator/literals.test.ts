import { describe, it, expect } from "vitest";

import { SourceLines } from "#ast";
import { parser } from "#parser";

import { toFixed10, translateNumber } from "./literals.js";

function numberAt(source: string) {
  const [statement] = parser.parse(source).body;
  if (statement?.type !== "Expr" || statement.value.type !== "Num") {
    throw new Error("Expected a number");
  }
  return translateNumber(statement.value, new SourceLines(source));
}

describe("toFixed10", () => {
  const cases = [
    { text: "1.5", numerator: 15n, denominator: 10n },
    { text: "0.1", numerator: 1n, denominator: 10n },
    { text: "-0.25", numerator: -25n, denominator: 100n },
    { text: "123.456", numerator: 123456n, denominator: 1000n },
    { text: "2.0", numerator: 2n, denominator: 1n },
    { text: ".5", numerator: 5n, denominator: 10n },
    { text: "7.", numerator: 7n, denominator: 1n },
    { text: "1e-10", numerator: 1n, denominator: 10n ** 10n },
    { text: "1.5E-3", numerator: 15n, denominator: 10000n },
    { text: "1e21", numerator: 10n ** 21n, denominator: 1n },
  ];

  for (const { text, numerator, denominator } of cases) {
    it(`should represent ${text} exactly`, () => {
      expect(toFixed10(text)).toEqual({ numerator, denominator });
    });
  }

  it("should keep every digit of long literals", () => {
    expect(toFixed10("12345678.1234567891")).toEqual({
      numerator: 123456781234567891n,
      denominator: 10n ** 10n,
    });
    expect(toFixed10("1234567890123456789.5")).toEqual({
      numerator: 12345678901234567895n,
      denominator: 10n,
    });
  });

  it("should round half to even past ten digits", () => {
    expect(toFixed10("0.12345678915")).toEqual({
      numerator: 1234567892n,
      denominator: 10n ** 10n,
    });
  });

  it("should keep the denominator minimal after rounding", () => {
    expect(toFixed10("0.12345678905")).toEqual({
      numerator: 123456789n,
      denominator: 10n ** 9n,
    });
  });

  it("should round values below the precision to zero", () => {
    expect(toFixed10("1.5e-11")).toEqual({ numerator: 0n, denominator: 1n });
  });

  it("should reject text that is not a decimal", () => {
    expect(() => toFixed10("inf")).toThrow(RangeError);
    expect(() => toFixed10(".")).toThrow(RangeError);
  });
});

describe("translateNumber", () => {
  it("should keep hex digits as written", () => {
    expect(numberAt("0x00aF")).toEqual({ kind: "hex", digits: "00aF" });
  });

  it("should treat an uppercase prefix as a plain integer", () => {
    expect(numberAt("0XFF")).toEqual({ kind: "int", value: 255n });
  });

  it("should translate decimal integers", () => {
    expect(numberAt("255")).toEqual({ kind: "int", value: 255n });
  });

  it("should translate floats to fixed10", () => {
    expect(numberAt("2.5")).toEqual({
      kind: "fixed10",
      numerator: 25n,
      denominator: 10n,
    });
  });

  it("should translate floats from their source spelling", () => {
    expect(numberAt("12345678.1234567891")).toEqual({
      kind: "fixed10",
      numerator: 123456781234567891n,
      denominator: 10n ** 10n,
    });
  });
});
