/**
 * Statements to IR statements
 *
 * Blocks carry their nesting depth explicitly: a nested block is
 * translated at one level deeper than the statement that owns it.
 */

import * as Ast from "#ast";
import type * as Ir from "#ir";

import { TranslateErrorCode, UnsupportedConstruct } from "./errors.js";
import {
  rejectKeywordArguments,
  translateExpression,
  translateExpressions,
  translateVariable,
} from "./expressions.js";
import { augmentedOperators } from "./tables.js";
import { translateType } from "./types.js";

export function translateBlock(
  statements: Ast.Statement[],
  depth: number,
  lines: Ast.SourceLines,
): Ir.Block {
  return {
    depth,
    statements: statements.map((statement) =>
      translateStatement(statement, depth, lines),
    ),
  };
}

export function translateStatement(
  node: Ast.Statement,
  depth: number,
  lines: Ast.SourceLines,
): Ir.Statement {
  const expression = (inner: Ast.Expression) =>
    translateExpression(inner, lines);
  const nested = (body: Ast.Statement[]) =>
    translateBlock(body, depth + 1, lines);

  switch (node.type) {
    case "AnnAssign":
      if (node.value) {
        throw new UnsupportedConstruct(
          TranslateErrorCode.DECLARATION_INITIALIZER,
          undefined,
          node.value.loc,
        );
      }
      return {
        kind: "vdecl",
        name: declaredName(node.target),
        type: translateType(node.annotation, lines),
      };

    case "Assign": {
      if (node.targets.length !== 1) {
        throw new UnsupportedConstruct(
          TranslateErrorCode.MULTIPLE_TARGETS,
          undefined,
          node.loc,
        );
      }
      return {
        kind: "assign",
        target: translateVariable(node.targets[0], lines),
        value: expression(node.value),
      };
    }

    case "AugAssign":
      return {
        kind: "augassign",
        operator: augmentedOperators[node.operator],
        target: translateVariable(node.target, lines),
        value: expression(node.value),
      };

    case "If":
      return node.orelse.length === 0
        ? { kind: "if", test: expression(node.test), body: nested(node.body) }
        : {
            kind: "if",
            test: expression(node.test),
            body: nested(node.body),
            orelse: nested(node.orelse),
          };

    case "For":
      return translateFor(node, depth, lines);

    case "Break":
      return { kind: "break" };

    case "Pass":
      return { kind: "pass" };

    case "Return":
      return node.value
        ? { kind: "return", value: expression(node.value) }
        : { kind: "return" };

    case "Assert":
      if (node.message) {
        throw new UnsupportedConstruct(
          TranslateErrorCode.ASSERT_MESSAGE,
          undefined,
          node.message.loc,
        );
      }
      return { kind: "assert", test: expression(node.test) };

    case "Expr":
      return translateExpressionStatement(node, lines);

    case "FunctionDef":
    case "While":
    case "Continue":
    case "Raise":
    case "Delete":
    case "Import":
      throw new UnsupportedConstruct(
        TranslateErrorCode.UNSUPPORTED_STATEMENT,
        node.type,
        node.loc,
      );

    default: {
      const unexpected: never = node;
      throw new Error(`Unknown statement: ${JSON.stringify(unexpected)}`);
    }
  }
}

function translateFor(
  node: Ast.Statement.For,
  depth: number,
  lines: Ast.SourceLines,
): Ir.Statement {
  if (node.orelse.length > 0) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.LOOP_ELSE,
      undefined,
      node.loc,
    );
  }
  if (node.target.type !== "Name") {
    throw new UnsupportedConstruct(
      TranslateErrorCode.LOOP_TARGET,
      node.target.type,
      node.target.loc,
    );
  }

  const variable = node.target.id;
  const body = translateBlock(node.body, depth + 1, lines);
  const { iter } = node;

  if (iter.type === "Call" && Ast.Expression.isName(iter.func, "range")) {
    rejectKeywordArguments(iter);
    const [first, second] = translateExpressions(iter.args, lines);
    switch (iter.args.length) {
      case 1:
        return { kind: "forrange", variable, range: [first], body };
      case 2:
        return { kind: "forrange", variable, range: [first, second], body };
      default:
        throw new UnsupportedConstruct(
          TranslateErrorCode.RANGE_ARGUMENTS,
          `found ${iter.args.length}`,
          iter.loc,
        );
    }
  }

  return {
    kind: "forlist",
    variable,
    list: translateExpression(iter, lines),
    body,
  };
}

/**
 * `throw`, `log.Event(...)`, `send(to, amount)` and `selfdestruct(to)`
 */
function translateExpressionStatement(
  node: Ast.Statement.Expr,
  lines: Ast.SourceLines,
): Ir.Statement {
  const { value } = node;

  if (Ast.Expression.isName(value, "throw")) {
    return { kind: "throw" };
  }

  if (value.type !== "Call") {
    throw new UnsupportedConstruct(
      TranslateErrorCode.UNSUPPORTED_STATEMENT,
      `expression statement ${value.type}`,
      node.loc,
    );
  }

  const { func } = value;

  if (func.type === "Attribute" && Ast.Expression.isName(func.value, "log")) {
    rejectKeywordArguments(value);
    return {
      kind: "log",
      event: func.attr,
      args: translateExpressions(value.args, lines),
    };
  }

  if (func.type === "Name") {
    switch (func.id) {
      case "send": {
        rejectKeywordArguments(value);
        const [recipient, amount] = builtinArguments(value, 2, lines);
        return { kind: "send", recipient, amount };
      }
      case "selfdestruct": {
        rejectKeywordArguments(value);
        const [beneficiary] = builtinArguments(value, 1, lines);
        return { kind: "selfdestruct", beneficiary };
      }
    }
  }

  throw new UnsupportedConstruct(
    TranslateErrorCode.UNSUPPORTED_CALL_STATEMENT,
    undefined,
    node.loc,
  );
}

function builtinArguments(
  call: Ast.Expression.Call,
  count: number,
  lines: Ast.SourceLines,
): Ir.Expression[] {
  if (call.args.length !== count) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.BUILTIN_ARGUMENTS,
      `expected ${count}, found ${call.args.length}`,
      call.loc,
    );
  }
  return translateExpressions(call.args, lines);
}

function declaredName(target: Ast.Expression): string {
  if (target.type !== "Name") {
    throw new UnsupportedConstruct(
      TranslateErrorCode.UNSUPPORTED_VARIABLE,
      `cannot declare ${target.type}`,
      target.loc,
    );
  }
  return target.id;
}
