/**
 * Renders IR terms as prefix-notation text
 *
 * Rendering is a pure function of each term's fields; indentation comes
 * from the depth recorded on each block.
 */

import type * as Ir from "./spec/index.js";

const INDENT = "  ";

export function formatProgram(program: Ir.Program): string {
  const events = program.events.map((event) => `\n${formatEvent(event)}`);
  const section = (items: string[]) =>
    items.length === 0 ? " " : items.map((item) => `\n${item}`).join("");

  return [
    "%pgm(",
    events.join(""),
    ",",
    section(program.globals.map(formatGlobal)),
    ",",
    section(program.init.map(formatFunction)),
    ",",
    section(program.functions.map(formatFunction)),
    "\n)",
  ].join("");
}

function formatEvent(event: Ir.Program.Event): string {
  const parameters = event.parameters
    .map(
      ({ name, type, indexed }) =>
        `%eparam(${name}, ${formatType(type)}, ${indexed})`,
    )
    .join(" ");
  return `${INDENT}%event(${event.name}, ${parameters})`;
}

function formatGlobal(global: Ir.Program.Global): string {
  return `${INDENT}%svdecl(${global.name}, ${formatType(global.type)}, %${global.visibility})`;
}

function formatFunction(fn: Ir.Program.Function): string {
  const decorators = fn.decorators.map((name) => `%@${name}`).join(" ");
  const parameters = fn.parameters
    .map(({ name, type }) => `%param(${name}, ${formatType(type)})`)
    .join(" ");
  return (
    `${INDENT}%fdecl(${decorators}, ${fn.name}, ${parameters}, ` +
    `${formatType(fn.returns)},${formatBlock(fn.body)})`
  );
}

export function formatBlock(block: Ir.Block): string {
  const prefix = `\n${INDENT.repeat(block.depth)}`;
  return block.statements
    .map((statement) => prefix + formatStatement(statement))
    .join("");
}

export function formatStatement(statement: Ir.Statement): string {
  switch (statement.kind) {
    case "vdecl":
      return `%vdecl(${statement.name}, ${formatType(statement.type)})`;
    case "assign":
      return `%assign(${formatExpression(statement.target)}, ${formatExpression(statement.value)})`;
    case "augassign":
      return `%augassign(${statement.operator}, ${formatExpression(statement.target)}, ${formatExpression(statement.value)})`;
    case "if": {
      const test = formatExpression(statement.test);
      const body = formatBlock(statement.body);
      return statement.orelse
        ? `%if(${test},${body},${formatBlock(statement.orelse)})`
        : `%if(${test},${body})`;
    }
    case "forrange": {
      const range = statement.range.map(formatExpression).join(", ");
      return `%forrange(${statement.variable}, ${range},${formatBlock(statement.body)})`;
    }
    case "forlist":
      return `%forlist(${statement.variable}, ${formatExpression(statement.list)},${formatBlock(statement.body)})`;
    case "break":
      return "%break";
    case "pass":
      return "%pass";
    case "return":
      return statement.value
        ? `%return(${formatExpression(statement.value)})`
        : "%return";
    case "assert":
      return `%assert(${formatExpression(statement.test)})`;
    case "throw":
      return "%throw";
    case "log":
      return `%log(${statement.event}, ${formatExpressions(statement.args, " ")})`;
    case "send":
      return `%send(${formatExpression(statement.recipient)}, ${formatExpression(statement.amount)})`;
    case "selfdestruct":
      return `%selfdestruct(${formatExpression(statement.beneficiary)})`;
    default: {
      const unexpected: never = statement;
      throw new Error(`Unknown statement: ${JSON.stringify(unexpected)}`);
    }
  }
}

export function formatType(type: Ir.Type): string {
  switch (type.kind) {
    case "void":
      return "%void";
    case "base":
      return `%${type.name}`;
    case "list":
      return `%listT(${formatType(type.element)}, ${formatExpression(type.size)})`;
    case "map":
      return `%mapT(${formatType(type.value)}, ${formatType(type.key)})`;
    case "bytes":
      return `%bytesT(${type.size})`;
    case "unit":
      return `%unitT(%${type.base}, ${formatUnit(type.unit)}, ${type.positional})`;
    case "struct": {
      const fields = type.fields
        .map(({ name, type }) => `%vdecl(${name}, ${formatType(type)})`)
        .join(" ");
      return `%structT(${fields})`;
    }
  }
}

export function formatUnit(unit: Ir.Unit): string {
  switch (unit.kind) {
    case "base":
      return `%${unit.name}`;
    case "mul":
      return `%umul(${formatUnit(unit.left)}, ${formatUnit(unit.right)})`;
    case "div":
      return `%udiv(${formatUnit(unit.left)}, ${formatUnit(unit.right)})`;
    case "pow":
      return `%upow(${formatUnit(unit.base)}, ${unit.exponent})`;
  }
}

export function formatExpression(expression: Ir.Expression): string {
  switch (expression.kind) {
    case "int":
      return expression.value.toString();
    case "hex":
      return `%hex("${expression.digits}")`;
    case "fixed10":
      return `%fixed10(${expression.numerator}, ${expression.denominator})`;
    case "string":
      return `"${expression.value.replace(/["\\]/g, "\\$&")}"`;
    case "bool":
      return String(expression.value);
    case "self":
      return "%self";
    case "reserved":
      return `%${expression.name}`;
    case "var":
      return `%var(${expression.name})`;
    case "svar":
      return `%svar(${expression.name})`;
    case "attribute":
      return `%attribute(${formatExpression(expression.base)}, ${expression.field})`;
    case "subscript":
      return `%subscript(${formatExpression(expression.base)}, ${formatExpression(expression.index)})`;
    case "list":
      return `%list(${formatExpressions(expression.elements, " ")})`;
    case "binop":
      return `%binop(${expression.operator}, ${formatExpression(expression.left)}, ${formatExpression(expression.right)})`;
    case "compareop":
      return `%compareop(%${expression.operator}, ${formatExpression(expression.left)}, ${formatExpression(expression.right)})`;
    case "boolop":
      return `%boolop(%${expression.operator}, ${formatExpression(expression.left)}, ${formatExpression(expression.right)})`;
    case "unaryop":
      return `%unaryop(%${expression.operator}, ${formatExpression(expression.operand)})`;
    case "icall":
      return `%icall(${expression.method}, ${formatExpressions(expression.args, " ")})`;
    case "call":
      return `%${expression.name}(${formatExpressions(expression.args, ", ")})`;
    case "as_wei_value":
      return `%as_wei_value(${formatExpression(expression.value)}, ${expression.unit})`;
  }
}

function formatExpressions(
  expressions: Ir.Expression[],
  separator: string,
): string {
  return expressions.map(formatExpression).join(separator);
}
