/**
 * Type annotations to IR types
 */

import * as Ast from "#ast";
import type * as Ir from "#ir";

import { TranslateErrorCode, UnsupportedConstruct } from "./errors.js";
import { isPureNumeric } from "./tables.js";
import { translateNumber } from "./literals.js";

export function translateType(
  node: Ast.Expression | null,
  lines: Ast.SourceLines,
): Ir.Type {
  if (!node) {
    return { kind: "void" };
  }

  switch (node.type) {
    case "Name":
      return { kind: "base", name: node.id };

    case "Compare":
      if (Ast.Expression.isName(node.left, "bytes")) {
        return byteArrayType(node);
      }
      break;

    case "Subscript":
      return subscriptType(node, lines);

    case "Dict":
      return {
        kind: "struct",
        fields: node.keys.map((key, index) => ({
          name: fieldName(key),
          type: translateType(node.values[index], lines),
        })),
      };

    case "Call":
      return unitType(node, lines);
  }

  throw new UnsupportedConstruct(
    TranslateErrorCode.UNSUPPORTED_TYPE,
    node.type,
    node.loc,
  );
}

/**
 * Name of a struct field or event parameter given as a dict key
 */
export function fieldName(key: Ast.Expression): string {
  if (key.type !== "Name") {
    throw new UnsupportedConstruct(
      TranslateErrorCode.INVALID_FIELD_NAME,
      key.type,
      key.loc,
    );
  }
  return key.id;
}

// `bytes <= 100`
function byteArrayType(node: Ast.Expression.Compare): Ir.Type {
  const [operator] = node.operators;
  const [size] = node.comparators;
  if (
    node.operators.length !== 1 ||
    operator !== "<=" ||
    size.type !== "Num" ||
    size.value.kind !== "int"
  ) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.INVALID_SIZE,
      "byte arrays are declared as `bytes <= N`",
      node.loc,
    );
  }
  return { kind: "bytes", size: size.value.value };
}

// `num[3]` is a list, `num256[address]` a map from address to num256
function subscriptType(
  node: Ast.Expression.Subscript,
  lines: Ast.SourceLines,
): Ir.Type {
  const { index } = node;

  if (index.type === "Num") {
    const size = translateNumber(index, lines);
    if (size.kind !== "int" && size.kind !== "hex") {
      throw new UnsupportedConstruct(
        TranslateErrorCode.INVALID_SIZE,
        "list sizes must be integers",
        index.loc,
      );
    }
    return { kind: "list", element: translateType(node.value, lines), size };
  }

  if (index.type === "Slice") {
    throw new UnsupportedConstruct(
      TranslateErrorCode.SLICE_INDEX,
      undefined,
      index.loc,
    );
  }

  return {
    kind: "map",
    value: translateType(node.value, lines),
    key: translateType(index, lines),
  };
}

// `num(wei / sec)` or `decimal(wei, positional)`
function unitType(node: Ast.Expression.Call, lines: Ast.SourceLines): Ir.Type {
  const { func, args } = node;
  if (func.type !== "Name" || !isPureNumeric(func.id)) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.UNSUPPORTED_TYPE,
      "only num and decimal take a unit",
      node.loc,
    );
  }

  if (node.keywords.length > 0) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.KEYWORD_ARGUMENT,
      undefined,
      node.keywords[0].loc,
    );
  }

  const [unit, flag] = args;
  if (
    !unit ||
    args.length > 2 ||
    (flag && !Ast.Expression.isName(flag, "positional"))
  ) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.UNSUPPORTED_UNIT,
      `expected ${func.id}(UNIT) or ${func.id}(UNIT, positional)`,
      node.loc,
    );
  }

  return {
    kind: "unit",
    base: func.id,
    unit: translateUnit(unit, lines),
    positional: flag !== undefined,
  };
}

export function translateUnit(
  node: Ast.Expression,
  lines: Ast.SourceLines,
): Ir.Unit {
  if (node.type === "Name") {
    return { kind: "base", name: node.id };
  }

  if (node.type === "BinOp") {
    switch (node.operator) {
      case "*":
        return {
          kind: "mul",
          left: translateUnit(node.left, lines),
          right: translateUnit(node.right, lines),
        };
      case "/":
        return {
          kind: "div",
          left: translateUnit(node.left, lines),
          right: translateUnit(node.right, lines),
        };
      case "**":
        return {
          kind: "pow",
          base: translateUnit(node.left, lines),
          exponent: unitExponent(node.right),
        };
      default:
        throw new UnsupportedConstruct(
          TranslateErrorCode.UNSUPPORTED_UNIT,
          `operator ${node.operator}`,
          node.loc,
        );
    }
  }

  throw new UnsupportedConstruct(
    TranslateErrorCode.UNSUPPORTED_UNIT,
    node.type,
    node.loc,
  );
}

function unitExponent(node: Ast.Expression): bigint {
  if (node.type !== "Num" || node.value.kind !== "int") {
    throw new UnsupportedConstruct(
      TranslateErrorCode.UNSUPPORTED_UNIT,
      "exponents must be integer literals",
      node.loc,
    );
  }
  return node.value.value;
}
