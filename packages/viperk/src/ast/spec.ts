/**
 * Generic syntax tree for Viper source
 *
 * The tree mirrors the shape of a Python module: it describes what was
 * written, not whether the translator supports it. Constructs outside the
 * translatable subset (while loops, tuples, keyword arguments, ...) still
 * get a node so that the translator can reject them with a precise
 * diagnostic.
 *
 * Every node kind is a member of a closed discriminated union on `type`.
 */

export interface SourceLocation {
  offset: number;
  length: number;
  line: number; // 1-based
  column: number; // 0-based
}

export type Node = Module | Statement | Expression;

export namespace Node {
  export interface Base {
    type: string;
    loc: SourceLocation | null;
  }
}

export interface Module extends Node.Base {
  type: "Module";
  body: Statement[];
}

export function module(
  body: Statement[],
  loc?: SourceLocation,
): Module {
  return { type: "Module", body, loc: loc ?? null };
}

// Operators

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "//"
  | "%"
  | "**"
  | "<<"
  | ">>"
  | "|"
  | "^"
  | "&"
  | "@";

export type UnaryOperator = "not" | "-" | "+" | "~";

export type BooleanOperator = "and" | "or";

export type ComparisonOperator =
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "in"
  | "not in"
  | "is"
  | "is not";

// Statements

export type Statement =
  | Statement.FunctionDef
  | Statement.Assign
  | Statement.AnnAssign
  | Statement.AugAssign
  | Statement.If
  | Statement.For
  | Statement.While
  | Statement.Break
  | Statement.Continue
  | Statement.Pass
  | Statement.Return
  | Statement.Assert
  | Statement.Raise
  | Statement.Delete
  | Statement.Import
  | Statement.Expr;

export namespace Statement {
  export interface FunctionDef extends Node.Base {
    type: "FunctionDef";
    name: string;
    decorators: Expression[];
    parameters: Parameter[];
    returns: Expression | null;
    body: Statement[];
  }

  export interface Parameter {
    name: string;
    kind: "positional" | "variadic" | "keywords";
    annotation: Expression | null;
    default: Expression | null;
    loc: SourceLocation | null;
  }

  export function functionDef(
    name: string,
    decorators: Expression[],
    parameters: Parameter[],
    returns: Expression | null,
    body: Statement[],
    loc?: SourceLocation,
  ): FunctionDef {
    return {
      type: "FunctionDef",
      name,
      decorators,
      parameters,
      returns,
      body,
      loc: loc ?? null,
    };
  }

  export interface Assign extends Node.Base {
    type: "Assign";
    targets: Expression[];
    value: Expression;
  }

  export function assign(
    targets: Expression[],
    value: Expression,
    loc?: SourceLocation,
  ): Assign {
    return { type: "Assign", targets, value, loc: loc ?? null };
  }

  export interface AnnAssign extends Node.Base {
    type: "AnnAssign";
    target: Expression;
    annotation: Expression;
    value: Expression | null;
  }

  export function annAssign(
    target: Expression,
    annotation: Expression,
    value: Expression | null,
    loc?: SourceLocation,
  ): AnnAssign {
    return { type: "AnnAssign", target, annotation, value, loc: loc ?? null };
  }

  export interface AugAssign extends Node.Base {
    type: "AugAssign";
    target: Expression;
    operator: BinaryOperator;
    value: Expression;
  }

  export function augAssign(
    target: Expression,
    operator: BinaryOperator,
    value: Expression,
    loc?: SourceLocation,
  ): AugAssign {
    return { type: "AugAssign", target, operator, value, loc: loc ?? null };
  }

  export interface If extends Node.Base {
    type: "If";
    test: Expression;
    body: Statement[];
    orelse: Statement[];
  }

  export function if_(
    test: Expression,
    body: Statement[],
    orelse: Statement[],
    loc?: SourceLocation,
  ): If {
    return { type: "If", test, body, orelse, loc: loc ?? null };
  }

  export interface For extends Node.Base {
    type: "For";
    target: Expression;
    iter: Expression;
    body: Statement[];
    orelse: Statement[];
  }

  export function for_(
    target: Expression,
    iter: Expression,
    body: Statement[],
    orelse: Statement[],
    loc?: SourceLocation,
  ): For {
    return { type: "For", target, iter, body, orelse, loc: loc ?? null };
  }

  export interface While extends Node.Base {
    type: "While";
    test: Expression;
    body: Statement[];
    orelse: Statement[];
  }

  export function while_(
    test: Expression,
    body: Statement[],
    orelse: Statement[],
    loc?: SourceLocation,
  ): While {
    return { type: "While", test, body, orelse, loc: loc ?? null };
  }

  export interface Break extends Node.Base {
    type: "Break";
  }

  export interface Continue extends Node.Base {
    type: "Continue";
  }

  export interface Pass extends Node.Base {
    type: "Pass";
  }

  export function break_(loc?: SourceLocation): Break {
    return { type: "Break", loc: loc ?? null };
  }

  export function continue_(loc?: SourceLocation): Continue {
    return { type: "Continue", loc: loc ?? null };
  }

  export function pass(loc?: SourceLocation): Pass {
    return { type: "Pass", loc: loc ?? null };
  }

  export interface Return extends Node.Base {
    type: "Return";
    value: Expression | null;
  }

  export function return_(
    value: Expression | null,
    loc?: SourceLocation,
  ): Return {
    return { type: "Return", value, loc: loc ?? null };
  }

  export interface Assert extends Node.Base {
    type: "Assert";
    test: Expression;
    message: Expression | null;
  }

  export function assert(
    test: Expression,
    message: Expression | null,
    loc?: SourceLocation,
  ): Assert {
    return { type: "Assert", test, message, loc: loc ?? null };
  }

  export interface Raise extends Node.Base {
    type: "Raise";
    exception: Expression | null;
  }

  export function raise(
    exception: Expression | null,
    loc?: SourceLocation,
  ): Raise {
    return { type: "Raise", exception, loc: loc ?? null };
  }

  export interface Delete extends Node.Base {
    type: "Delete";
    targets: Expression[];
  }

  export function delete_(
    targets: Expression[],
    loc?: SourceLocation,
  ): Delete {
    return { type: "Delete", targets, loc: loc ?? null };
  }

  // Covers both `import a.b` and `from a import b`
  export interface Import extends Node.Base {
    type: "Import";
    from: string | null;
    names: string[];
  }

  export function import_(
    from: string | null,
    names: string[],
    loc?: SourceLocation,
  ): Import {
    return { type: "Import", from, names, loc: loc ?? null };
  }

  // Expression used as a statement
  export interface Expr extends Node.Base {
    type: "Expr";
    value: Expression;
  }

  export function expr(value: Expression, loc?: SourceLocation): Expr {
    return { type: "Expr", value, loc: loc ?? null };
  }
}

// Expressions

export type Expression =
  | Expression.Num
  | Expression.Str
  | Expression.NameConstant
  | Expression.Name
  | Expression.Attribute
  | Expression.Subscript
  | Expression.Slice
  | Expression.Call
  | Expression.Starred
  | Expression.BinOp
  | Expression.UnaryOp
  | Expression.BoolOp
  | Expression.Compare
  | Expression.List
  | Expression.Tuple
  | Expression.Dict
  | Expression.IfExp;

export namespace Expression {
  /**
   * Numeric literal. Integers are kept exact; floats keep their decimal
   * spelling alongside the parsed value. Whether an integer was written in
   * hex is not recorded here and must be recovered from the source text.
   */
  export interface Num extends Node.Base {
    type: "Num";
    value: Num.Value;
  }

  export namespace Num {
    export type Value =
      | { kind: "int"; value: bigint }
      | { kind: "float"; value: number; text: string };
  }

  export function int(value: bigint, loc?: SourceLocation): Num {
    return { type: "Num", value: { kind: "int", value }, loc: loc ?? null };
  }

  export function float(text: string, loc?: SourceLocation): Num {
    return {
      type: "Num",
      value: { kind: "float", value: Number(text), text },
      loc: loc ?? null,
    };
  }

  export interface Str extends Node.Base {
    type: "Str";
    value: string;
  }

  export function str(value: string, loc?: SourceLocation): Str {
    return { type: "Str", value, loc: loc ?? null };
  }

  // True, False and None
  export interface NameConstant extends Node.Base {
    type: "NameConstant";
    value: boolean | null;
  }

  export function nameConstant(
    value: boolean | null,
    loc?: SourceLocation,
  ): NameConstant {
    return { type: "NameConstant", value, loc: loc ?? null };
  }

  export interface Name extends Node.Base {
    type: "Name";
    id: string;
  }

  export function name(id: string, loc?: SourceLocation): Name {
    return { type: "Name", id, loc: loc ?? null };
  }

  export const isName = (
    expression: Expression | null | undefined,
    id?: string,
  ): expression is Name =>
    !!expression &&
    expression.type === "Name" &&
    (id === undefined || expression.id === id);

  export interface Attribute extends Node.Base {
    type: "Attribute";
    value: Expression;
    attr: string;
  }

  export function attribute(
    value: Expression,
    attr: string,
    loc?: SourceLocation,
  ): Attribute {
    return { type: "Attribute", value, attr, loc: loc ?? null };
  }

  export interface Subscript extends Node.Base {
    type: "Subscript";
    value: Expression;
    index: Expression;
  }

  export function subscript(
    value: Expression,
    index: Expression,
    loc?: SourceLocation,
  ): Subscript {
    return { type: "Subscript", value, index, loc: loc ?? null };
  }

  // Only appears as the index of a subscript
  export interface Slice extends Node.Base {
    type: "Slice";
    lower: Expression | null;
    upper: Expression | null;
    step: Expression | null;
  }

  export function slice(
    lower: Expression | null,
    upper: Expression | null,
    step: Expression | null,
    loc?: SourceLocation,
  ): Slice {
    return { type: "Slice", lower, upper, step, loc: loc ?? null };
  }

  export interface Call extends Node.Base {
    type: "Call";
    func: Expression;
    args: Expression[];
    keywords: Keyword[];
  }

  // `arg` is null for `**kwargs`
  export interface Keyword {
    arg: string | null;
    value: Expression;
    loc: SourceLocation | null;
  }

  export function call(
    func: Expression,
    args: Expression[],
    keywords: Keyword[] = [],
    loc?: SourceLocation,
  ): Call {
    return { type: "Call", func, args, keywords, loc: loc ?? null };
  }

  export interface Starred extends Node.Base {
    type: "Starred";
    value: Expression;
  }

  export function starred(value: Expression, loc?: SourceLocation): Starred {
    return { type: "Starred", value, loc: loc ?? null };
  }

  export interface BinOp extends Node.Base {
    type: "BinOp";
    operator: BinaryOperator;
    left: Expression;
    right: Expression;
  }

  export function binOp(
    operator: BinaryOperator,
    left: Expression,
    right: Expression,
    loc?: SourceLocation,
  ): BinOp {
    return { type: "BinOp", operator, left, right, loc: loc ?? null };
  }

  export interface UnaryOp extends Node.Base {
    type: "UnaryOp";
    operator: UnaryOperator;
    operand: Expression;
  }

  export function unaryOp(
    operator: UnaryOperator,
    operand: Expression,
    loc?: SourceLocation,
  ): UnaryOp {
    return { type: "UnaryOp", operator, operand, loc: loc ?? null };
  }

  // `a and b and c` is a single node with three values
  export interface BoolOp extends Node.Base {
    type: "BoolOp";
    operator: BooleanOperator;
    values: Expression[];
  }

  export function boolOp(
    operator: BooleanOperator,
    values: Expression[],
    loc?: SourceLocation,
  ): BoolOp {
    return { type: "BoolOp", operator, values, loc: loc ?? null };
  }

  // `a < b < c` is a single node with two operators
  export interface Compare extends Node.Base {
    type: "Compare";
    left: Expression;
    operators: ComparisonOperator[];
    comparators: Expression[];
  }

  export function compare(
    left: Expression,
    operators: ComparisonOperator[],
    comparators: Expression[],
    loc?: SourceLocation,
  ): Compare {
    return {
      type: "Compare",
      left,
      operators,
      comparators,
      loc: loc ?? null,
    };
  }

  export interface List extends Node.Base {
    type: "List";
    elements: Expression[];
  }

  export function list(
    elements: Expression[],
    loc?: SourceLocation,
  ): List {
    return { type: "List", elements, loc: loc ?? null };
  }

  export interface Tuple extends Node.Base {
    type: "Tuple";
    elements: Expression[];
  }

  export function tuple(
    elements: Expression[],
    loc?: SourceLocation,
  ): Tuple {
    return { type: "Tuple", elements, loc: loc ?? null };
  }

  export interface Dict extends Node.Base {
    type: "Dict";
    keys: Expression[];
    values: Expression[];
  }

  export function dict(
    keys: Expression[],
    values: Expression[],
    loc?: SourceLocation,
  ): Dict {
    return { type: "Dict", keys, values, loc: loc ?? null };
  }

  export interface IfExp extends Node.Base {
    type: "IfExp";
    test: Expression;
    body: Expression;
    orelse: Expression;
  }

  export function ifExp(
    test: Expression,
    body: Expression,
    orelse: Expression,
    loc?: SourceLocation,
  ): IfExp {
    return { type: "IfExp", test, body, orelse, loc: loc ?? null };
  }
}
