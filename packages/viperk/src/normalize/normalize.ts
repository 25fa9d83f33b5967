import * as Ast from "#ast";

/**
 * Fold `-<numeric literal>` into a negative literal
 *
 * The folded literal takes the location of the original operand.
 * Hexadecimal operands are left as a negation so that their digits can
 * still be recovered from the source.
 */
export function normalizeLiterals(
  module: Ast.Module,
  lines: Ast.SourceLines,
): Ast.Module {
  return Ast.rewriteModule(module, (expression) => {
    if (
      expression.type !== "UnaryOp" ||
      expression.operator !== "-" ||
      expression.operand.type !== "Num"
    ) {
      return expression;
    }

    const operand = expression.operand;
    if (lines.hexDigitsAt(operand.loc) !== undefined) {
      return expression;
    }

    return { ...operand, value: negate(operand.value) };
  });
}

function negate(value: Ast.Expression.Num.Value): Ast.Expression.Num.Value {
  switch (value.kind) {
    case "int":
      return { kind: "int", value: -value.value };
    case "float":
      return {
        kind: "float",
        value: -value.value,
        text: value.text.startsWith("-")
          ? value.text.slice(1)
          : `-${value.text}`,
      };
  }
}
