/**
 * Top-level assembly: sorts module declarations into events, storage
 * globals, constructors and functions
 */

import * as Ast from "#ast";
import type * as Ir from "#ir";

import { TranslateErrorCode, UnsupportedConstruct } from "./errors.js";
import { translateBlock } from "./statements.js";
import { fieldName, translateType } from "./types.js";
import { CONSTRUCTOR, EVENT_MARKER } from "./tables.js";

// Function bodies sit two levels deep inside the program term
export const FUNCTION_BODY_DEPTH = 2;

export function translateProgram(
  module: Ast.Module,
  lines: Ast.SourceLines,
): Ir.Program {
  const program: Ir.Program = {
    events: [],
    globals: [],
    init: [],
    functions: [],
  };

  for (const node of module.body) {
    switch (node.type) {
      case "AnnAssign":
        if (isEventDeclaration(node)) {
          program.events.push(translateEvent(node, lines));
        } else {
          program.globals.push(translateGlobal(node, lines));
        }
        break;

      case "FunctionDef": {
        const fn = translateFunction(node, lines);
        (node.name === CONSTRUCTOR ? program.init : program.functions).push(
          fn,
        );
        break;
      }

      default:
        throw new UnsupportedConstruct(
          TranslateErrorCode.UNSUPPORTED_TOP_LEVEL,
          node.type,
          node.loc,
        );
    }
  }

  return program;
}

const isEventDeclaration = (node: Ast.Statement.AnnAssign): boolean =>
  node.annotation.type === "Call" &&
  Ast.Expression.isName(node.annotation.func, EVENT_MARKER);

// `Transfer: __log__({_from: indexed(address), _value: num256})`
function translateEvent(
  node: Ast.Statement.AnnAssign,
  lines: Ast.SourceLines,
): Ir.Program.Event {
  const { annotation } = node;
  const [parameters] = annotation.type === "Call" ? annotation.args : [];
  if (
    annotation.type !== "Call" ||
    annotation.args.length !== 1 ||
    annotation.keywords.length > 0 ||
    parameters.type !== "Dict"
  ) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.INVALID_EVENT,
      `expected ${EVENT_MARKER}({name: type, ...})`,
      annotation.loc,
    );
  }
  rejectInitializer(node);

  return {
    name: declaredName(node),
    parameters: parameters.keys.map((key, index) =>
      eventParameter(key, parameters.values[index], lines),
    ),
  };
}

function eventParameter(
  key: Ast.Expression,
  annotation: Ast.Expression,
  lines: Ast.SourceLines,
): Ir.Program.EventParameter {
  const name = fieldName(key);
  if (
    annotation.type === "Call" &&
    Ast.Expression.isName(annotation.func, "indexed")
  ) {
    if (annotation.args.length !== 1 || annotation.keywords.length > 0) {
      throw new UnsupportedConstruct(
        TranslateErrorCode.INVALID_EVENT,
        "indexed() takes exactly one type",
        annotation.loc,
      );
    }
    return {
      name,
      type: translateType(annotation.args[0], lines),
      indexed: true,
    };
  }
  return { name, type: translateType(annotation, lines), indexed: false };
}

// `total: public(num256)`; without a wrapper the variable is private
function translateGlobal(
  node: Ast.Statement.AnnAssign,
  lines: Ast.SourceLines,
): Ir.Program.Global {
  rejectInitializer(node);
  const name = declaredName(node);
  const { annotation } = node;

  if (annotation.type === "Call" && annotation.func.type === "Name") {
    const visibility = annotation.func.id;
    if (visibility === "public" || visibility === "private") {
      if (annotation.args.length !== 1 || annotation.keywords.length > 0) {
        throw new UnsupportedConstruct(
          TranslateErrorCode.BUILTIN_ARGUMENTS,
          `${visibility}() takes exactly one type`,
          annotation.loc,
        );
      }
      return {
        name,
        type: translateType(annotation.args[0], lines),
        visibility,
      };
    }
  }

  return { name, type: translateType(annotation, lines), visibility: "private" };
}

function translateFunction(
  node: Ast.Statement.FunctionDef,
  lines: Ast.SourceLines,
): Ir.Program.Function {
  return {
    decorators: node.decorators.map((decorator) => {
      if (decorator.type !== "Name") {
        throw new UnsupportedConstruct(
          TranslateErrorCode.UNSUPPORTED_DECORATOR,
          decorator.type,
          decorator.loc,
        );
      }
      return decorator.id;
    }),
    name: node.name,
    parameters: node.parameters.map((parameter) =>
      translateParameter(parameter, lines),
    ),
    returns: translateType(node.returns, lines),
    body: translateBlock(node.body, FUNCTION_BODY_DEPTH, lines),
  };
}

function translateParameter(
  parameter: Ast.Statement.Parameter,
  lines: Ast.SourceLines,
): Ir.Program.Parameter {
  const problem =
    parameter.kind !== "positional"
      ? `variadic parameter ${parameter.name}`
      : parameter.default
        ? `default value for ${parameter.name}`
        : !parameter.annotation
          ? `missing type for ${parameter.name}`
          : undefined;

  if (problem || !parameter.annotation) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.UNSUPPORTED_PARAMETER,
      problem,
      parameter.loc,
    );
  }

  return {
    name: parameter.name,
    type: translateType(parameter.annotation, lines),
  };
}

function rejectInitializer(node: Ast.Statement.AnnAssign): void {
  if (node.value) {
    throw new UnsupportedConstruct(
      TranslateErrorCode.DECLARATION_INITIALIZER,
      undefined,
      node.value.loc,
    );
  }
}

function declaredName(node: Ast.Statement.AnnAssign): string {
  if (node.target.type !== "Name") {
    throw new UnsupportedConstruct(
      TranslateErrorCode.UNSUPPORTED_TOP_LEVEL,
      `cannot declare ${node.target.type}`,
      node.target.loc,
    );
  }
  return node.target.id;
}
