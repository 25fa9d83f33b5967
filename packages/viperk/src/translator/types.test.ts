import { describe, it, expect } from "vitest";

import { SourceLines } from "#ast";
import { formatType } from "#ir";
import { parser } from "#parser";

import { TranslateErrorCode, UnsupportedConstruct } from "./errors.js";
import { translateType } from "./types.js";

// Translate the annotation of `x: <annotation>`
function typeOf(annotation: string) {
  const source = `x: ${annotation}\n`;
  const [statement] = parser.parse(source).body;
  if (statement?.type !== "AnnAssign") throw new Error("Expected a declaration");
  return translateType(statement.annotation, new SourceLines(source));
}

function failure(run: () => unknown): UnsupportedConstruct {
  try {
    run();
  } catch (error) {
    if (error instanceof UnsupportedConstruct) return error;
    throw error;
  }
  throw new Error("Expected an unsupported construct");
}

describe("translateType", () => {
  const cases = [
    { annotation: "num", expected: "%num" },
    { annotation: "num[3]", expected: "%listT(%num, 3)" },
    { annotation: "num[0x10]", expected: '%listT(%num, %hex("10"))' },
    { annotation: "num256[address]", expected: "%mapT(%num256, %address)" },
    {
      annotation: "num[address][bytes32]",
      expected: "%mapT(%mapT(%num, %address), %bytes32)",
    },
    { annotation: "bytes <= 100", expected: "%bytesT(100)" },
    { annotation: "bytes <= 0x20", expected: "%bytesT(32)" },
    {
      annotation: "{a: num, b: address}",
      expected: "%structT(%vdecl(a, %num) %vdecl(b, %address))",
    },
    {
      annotation: "{owner: address, shares: num[4]}[num]",
      expected:
        "%mapT(%structT(%vdecl(owner, %address) %vdecl(shares, %listT(%num, 4))), %num)",
    },
    { annotation: "num(wei)", expected: "%unitT(%num, %wei, false)" },
    {
      annotation: "decimal(wei / sec, positional)",
      expected: "%unitT(%decimal, %udiv(%wei, %sec), true)",
    },
    {
      annotation: "num(m ** 2 * kg)",
      expected: "%unitT(%num, %umul(%upow(%m, 2), %kg), false)",
    },
  ];

  for (const { annotation, expected } of cases) {
    it(`should translate ${annotation}`, () => {
      expect(formatType(typeOf(annotation))).toBe(expected);
    });
  }

  it("should translate a missing annotation to void", () => {
    expect(translateType(null, new SourceLines(""))).toEqual({ kind: "void" });
  });

  describe("unsupported annotations", () => {
    it("should reject fractional list sizes", () => {
      const error = failure(() => typeOf("num[1.5]"));
      expect(error.code).toBe(TranslateErrorCode.INVALID_SIZE);
      expect(error.flavor).toBe("detail");
    });

    it("should reject slices", () => {
      expect(failure(() => typeOf("num[1:2]")).code).toBe(
        TranslateErrorCode.SLICE_INDEX,
      );
    });

    it("should reject unit types over other bases", () => {
      const error = failure(() => typeOf("foo(wei)"));
      expect(error.message).toBe(
        "Unsupported type: only num and decimal take a unit",
      );
      expect(error.flavor).toBe("structural");
    });

    it("should reject unit operators other than *, / and **", () => {
      expect(failure(() => typeOf("num(wei + sec)")).message).toBe(
        "Unsupported unit: operator +",
      );
    });

    it("should only take positional as the second argument", () => {
      expect(failure(() => typeOf("num(wei, 1)")).code).toBe(
        TranslateErrorCode.UNSUPPORTED_UNIT,
      );
    });

    it("should only take <= for byte arrays", () => {
      expect(failure(() => typeOf("bytes < 10")).code).toBe(
        TranslateErrorCode.INVALID_SIZE,
      );
    });

    it("should require names as struct fields", () => {
      expect(failure(() => typeOf("{1: num}")).message).toBe(
        "Field names must be identifiers: Num",
      );
    });

    it("should reject other shapes", () => {
      const error = failure(() => typeOf('"num"'));
      expect(error.message).toBe("Unsupported type: Str");
      expect(error.flavor).toBe("structural");
    });
  });
});
