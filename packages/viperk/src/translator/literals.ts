/**
 * Literal fidelity: hexadecimal spelling and fixed-point decimals
 */

import type * as Ast from "#ast";
import type * as Ir from "#ir";

export const FIXED10_PRECISION = 10;

/**
 * Translate a numeric literal. Integers written with a lowercase `0x`
 * prefix keep the digits as written in the source.
 */
export function translateNumber(
  num: Ast.Expression.Num,
  lines: Ast.SourceLines,
): Ir.Literal {
  const { value } = num;
  if (value.kind === "float") {
    return { kind: "fixed10", ...toFixed10(value.text) };
  }

  const digits = lines.hexDigitsAt(num.loc);
  if (digits !== undefined) {
    return { kind: "hex", digits };
  }
  return { kind: "int", value: value.value };
}

/**
 * Exact fraction `numerator / denominator` for a decimal literal as
 * written, with the denominator the smallest power of ten (at most 10^10)
 * making the numerator integral. Values with more fractional digits are
 * rounded half to even at the tenth.
 *
 * The spelling is read digit by digit, so `2.1` is 21/10 and
 * `12345678.1234567891` keeps all eighteen digits.
 */
export function toFixed10(text: string): {
  numerator: bigint;
  denominator: bigint;
} {
  const match = /^(-?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/.exec(text);
  if (!match || !/\d/.test(`${match[2]}${match[3] ?? ""}`)) {
    throw new RangeError(`Cannot represent ${text} as a fixed-point decimal`);
  }

  const [, sign, whole, fraction = "", exponent = "0"] = match;
  let digits = BigInt(`${whole}${fraction}` || "0");
  let scale = fraction.length - Number(exponent);

  if (scale <= 0) {
    return {
      numerator: applySign(sign, digits * 10n ** BigInt(-scale)),
      denominator: 1n,
    };
  }

  if (scale > FIXED10_PRECISION) {
    digits = roundHalfEven(
      digits,
      10n ** BigInt(scale - FIXED10_PRECISION),
    );
    scale = FIXED10_PRECISION;
  }

  while (scale > 0 && digits % 10n === 0n) {
    digits /= 10n;
    scale--;
  }

  return {
    numerator: applySign(sign, digits),
    denominator: 10n ** BigInt(scale),
  };
}

function roundHalfEven(dividend: bigint, divisor: bigint): bigint {
  const quotient = dividend / divisor;
  const twice = (dividend % divisor) * 2n;
  if (twice > divisor || (twice === divisor && quotient % 2n === 1n)) {
    return quotient + 1n;
  }
  return quotient;
}

const applySign = (sign: string, magnitude: bigint): bigint =>
  sign === "-" ? -magnitude : magnitude;
