/**
 * Fixed mappings from source operators and built-in names to IR symbols
 */

import type * as Ast from "#ast";
import type * as Ir from "#ir";

export const binaryOperators: Record<Ast.BinaryOperator, Ir.BinaryOperator> =
  {
    "+": "+",
    "-": "-",
    "*": "*",
    "/": "/",
    "//": "//",
    "%": "%",
    "**": "**",
    "&": "&",
    "|": "|",
    "^": "^",
    "<<": "<<",
    ">>": ">>",
    "@": "@",
  };

export const augmentedOperators: Record<
  Ast.BinaryOperator,
  Ir.AugmentedOperator
> = {
  "+": "+=",
  "-": "-=",
  "*": "*=",
  "/": "/=",
  "//": "//=",
  "%": "%=",
  "**": "**=",
  "&": "&=",
  "|": "|=",
  "^": "^=",
  "<<": "<<=",
  ">>": ">>=",
  "@": "@=",
};

// null marks operators the IR has no symbol for
export const comparisonOperators: Record<
  Ast.ComparisonOperator,
  Ir.ComparisonOperator | null
> = {
  "==": "eq",
  "!=": "ne",
  "<": "lt",
  "<=": "le",
  ">": "gt",
  ">=": "ge",
  in: "in",
  "not in": null,
  is: null,
  "is not": null,
};

export const booleanOperators: Record<Ast.BooleanOperator, "and" | "or"> = {
  and: "and",
  or: "or",
};

export const unaryOperators: Record<Ast.UnaryOperator, "not" | "neg" | null> =
  {
    not: "not",
    "-": "neg",
    "+": null,
    "~": null,
  };

/**
 * Environment properties readable as `<object>.<property>`
 */
const RESERVED: ReadonlySet<string> = new Set<Ir.ReservedExpression>([
  "msg.sender",
  "msg.value",
  "msg.gas",
  "block.difficulty",
  "block.timestamp",
  "block.coinbase",
  "block.number",
  "block.prevhash",
  "tx.origin",
]);

const isReserved = (name: string): name is Ir.ReservedExpression =>
  RESERVED.has(name);

export function reservedProperty(
  object: string,
  property: string,
): Ir.ReservedExpression | undefined {
  const name = `${object}.${property}`;
  return isReserved(name) ? name : undefined;
}

// Numeric types that take a unit argument, e.g. `num(wei)`
export const isPureNumeric = (name: string): name is Ir.Type.PureNumeric =>
  name === "num" || name === "decimal";

export const EVENT_MARKER = "__log__";
export const CONSTRUCTOR = "__init__";
export const WEI_SCALING = "as_wei_value";
