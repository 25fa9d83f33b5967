/**
 * Expressions to IR expressions
 *
 * Rules are tried in a fixed order and the first matching shape wins;
 * anything unmatched is rejected.
 */

import * as Ast from "#ast";
import type * as Ir from "#ir";

import { TranslateErrorCode, UnsupportedConstruct } from "./errors.js";
import { translateNumber } from "./literals.js";
import {
  binaryOperators,
  booleanOperators,
  comparisonOperators,
  reservedProperty,
  unaryOperators,
  WEI_SCALING,
} from "./tables.js";

export function translateExpression(
  node: Ast.Expression,
  lines: Ast.SourceLines,
): Ir.Expression {
  const expression = (inner: Ast.Expression) =>
    translateExpression(inner, lines);

  switch (node.type) {
    case "Num":
      return translateNumber(node, lines);

    case "Str":
      return { kind: "string", value: node.value };

    case "NameConstant":
      if (node.value === null) {
        throw new UnsupportedConstruct(
          TranslateErrorCode.NONE_LITERAL,
          undefined,
          node.loc,
        );
      }
      return { kind: "bool", value: node.value };

    case "Name":
      if (node.id === "true" || node.id === "false") {
        return { kind: "bool", value: node.id === "true" };
      }
      if (node.id === "self") {
        return { kind: "self" };
      }
      return translateVariable(node, lines);

    case "BinOp":
      return {
        kind: "binop",
        operator: binaryOperators[node.operator],
        left: expression(node.left),
        right: expression(node.right),
      };

    case "Compare": {
      if (node.operators.length !== 1) {
        throw new UnsupportedConstruct(
          TranslateErrorCode.CHAINED_COMPARISON,
          undefined,
          node.loc,
        );
      }
      const [symbol] = node.operators;
      const operator = comparisonOperators[symbol];
      if (!operator) {
        throw new UnsupportedConstruct(
          TranslateErrorCode.UNSUPPORTED_OPERATOR,
          `'${symbol}'`,
          node.loc,
        );
      }
      return {
        kind: "compareop",
        operator,
        left: expression(node.left),
        right: expression(node.comparators[0]),
      };
    }

    case "BoolOp": {
      if (node.values.length !== 2) {
        throw new UnsupportedConstruct(
          TranslateErrorCode.BOOLEAN_OPERAND_COUNT,
          `found ${node.values.length}`,
          node.loc,
        );
      }
      const [left, right] = node.values;
      return {
        kind: "boolop",
        operator: booleanOperators[node.operator],
        left: expression(left),
        right: expression(right),
      };
    }

    case "UnaryOp": {
      const operator = unaryOperators[node.operator];
      if (!operator) {
        throw new UnsupportedConstruct(
          TranslateErrorCode.UNSUPPORTED_OPERATOR,
          `unary '${node.operator}'`,
          node.loc,
        );
      }
      return {
        kind: "unaryop",
        operator,
        operand: expression(node.operand),
      };
    }

    case "Attribute":
      if (node.value.type === "Name") {
        const reserved = reservedProperty(node.value.id, node.attr);
        if (reserved) {
          return { kind: "reserved", name: reserved };
        }
      }
      return translateVariable(node, lines);

    case "Subscript":
      return translateVariable(node, lines);

    case "List":
      return { kind: "list", elements: node.elements.map(expression) };

    case "Call":
      return translateCall(node, lines);

    case "Slice":
      throw new UnsupportedConstruct(
        TranslateErrorCode.SLICE_INDEX,
        undefined,
        node.loc,
      );

    case "Starred":
    case "Tuple":
    case "Dict":
    case "IfExp":
      throw new UnsupportedConstruct(
        TranslateErrorCode.UNSUPPORTED_EXPRESSION,
        node.type,
        node.loc,
      );

    default: {
      const unexpected: never = node;
      throw new Error(`Unknown expression: ${JSON.stringify(unexpected)}`);
    }
  }
}

export function translateExpressions(
  nodes: Ast.Expression[],
  lines: Ast.SourceLines,
): Ir.Expression[] {
  return nodes.map((node) => translateExpression(node, lines));
}

/**
 * Variable reference chain: `x`, `self.x`, `a.b`, `a[i]`
 */
export function translateVariable(
  node: Ast.Expression,
  lines: Ast.SourceLines,
): Ir.Variable {
  switch (node.type) {
    case "Name":
      return { kind: "var", name: node.id };

    case "Attribute":
      if (Ast.Expression.isName(node.value, "self")) {
        return { kind: "svar", name: node.attr };
      }
      return {
        kind: "attribute",
        base: translateVariable(node.value, lines),
        field: node.attr,
      };

    case "Subscript":
      return {
        kind: "subscript",
        base: translateVariable(node.value, lines),
        index: translateExpression(node.index, lines),
      };

    default:
      throw new UnsupportedConstruct(
        TranslateErrorCode.UNSUPPORTED_VARIABLE,
        node.type,
        node.loc,
      );
  }
}

function translateCall(
  node: Ast.Expression.Call,
  lines: Ast.SourceLines,
): Ir.Expression {
  rejectKeywordArguments(node);
  const { func } = node;

  if (func.type === "Name") {
    if (func.id === WEI_SCALING) {
      return weiValue(node, lines);
    }
    return {
      kind: "call",
      name: func.id,
      args: translateExpressions(node.args, lines),
    };
  }

  if (func.type === "Attribute" && Ast.Expression.isName(func.value, "self")) {
    return {
      kind: "icall",
      method: func.attr,
      args: translateExpressions(node.args, lines),
    };
  }

  throw new UnsupportedConstruct(
    TranslateErrorCode.UNSUPPORTED_EXPRESSION,
    "call of a computed function",
    node.loc,
  );
}

// `as_wei_value(amount, wei)` or `as_wei_value(amount, "wei")`
function weiValue(
  node: Ast.Expression.Call,
  lines: Ast.SourceLines,
): Ir.Expression {
  const [value, unit] = node.args;
  if (node.args.length !== 2 || (unit.type !== "Name" && unit.type !== "Str")) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.BUILTIN_ARGUMENTS,
      `${WEI_SCALING} takes an amount and a unit name`,
      node.loc,
    );
  }

  return {
    kind: "as_wei_value",
    value: translateExpression(value, lines),
    unit: unit.type === "Name" ? unit.id : unit.value,
  };
}

/**
 * Calls take positional arguments only
 */
export function rejectKeywordArguments(node: Ast.Expression.Call): void {
  const [keyword] = node.keywords;
  if (keyword) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.KEYWORD_ARGUMENT,
      keyword.arg ?? "**",
      keyword.loc,
    );
  }

  const starred = node.args.find((arg) => arg.type === "Starred");
  if (starred) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.KEYWORD_ARGUMENT,
      "*",
      starred.loc,
    );
  }
}
