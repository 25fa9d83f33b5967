import type { Expression, Module, Statement } from "./spec.js";

export type ExpressionRewrite = (expression: Expression) => Expression;

/**
 * Rebuild a module bottom-up, passing every expression through `rewrite`
 * after its children have been rewritten. The input tree is left untouched.
 */
export function rewriteModule(
  module: Module,
  rewrite: ExpressionRewrite,
): Module {
  return {
    ...module,
    body: module.body.map((statement) => rewriteStatement(statement, rewrite)),
  };
}

export function rewriteStatement(
  statement: Statement,
  rewrite: ExpressionRewrite,
): Statement {
  const expr = (expression: Expression) =>
    rewriteExpression(expression, rewrite);
  const optional = (expression: Expression | null) =>
    expression && expr(expression);
  const block = (statements: Statement[]) =>
    statements.map((inner) => rewriteStatement(inner, rewrite));

  switch (statement.type) {
    case "FunctionDef":
      return {
        ...statement,
        decorators: statement.decorators.map(expr),
        parameters: statement.parameters.map((parameter) => ({
          ...parameter,
          annotation: optional(parameter.annotation),
          default: optional(parameter.default),
        })),
        returns: optional(statement.returns),
        body: block(statement.body),
      };
    case "Assign":
      return {
        ...statement,
        targets: statement.targets.map(expr),
        value: expr(statement.value),
      };
    case "AnnAssign":
      return {
        ...statement,
        target: expr(statement.target),
        annotation: expr(statement.annotation),
        value: optional(statement.value),
      };
    case "AugAssign":
      return {
        ...statement,
        target: expr(statement.target),
        value: expr(statement.value),
      };
    case "If":
    case "While":
      return {
        ...statement,
        test: expr(statement.test),
        body: block(statement.body),
        orelse: block(statement.orelse),
      };
    case "For":
      return {
        ...statement,
        target: expr(statement.target),
        iter: expr(statement.iter),
        body: block(statement.body),
        orelse: block(statement.orelse),
      };
    case "Return":
      return { ...statement, value: optional(statement.value) };
    case "Assert":
      return {
        ...statement,
        test: expr(statement.test),
        message: optional(statement.message),
      };
    case "Raise":
      return { ...statement, exception: optional(statement.exception) };
    case "Delete":
      return { ...statement, targets: statement.targets.map(expr) };
    case "Expr":
      return { ...statement, value: expr(statement.value) };
    case "Break":
    case "Continue":
    case "Pass":
    case "Import":
      return statement;
    default: {
      const unexpected: never = statement;
      return unexpected;
    }
  }
}

export function rewriteExpression(
  expression: Expression,
  rewrite: ExpressionRewrite,
): Expression {
  const expr = (inner: Expression) => rewriteExpression(inner, rewrite);
  const optional = (inner: Expression | null) => inner && expr(inner);

  switch (expression.type) {
    case "Num":
    case "Str":
    case "NameConstant":
    case "Name":
      return rewrite(expression);
    case "Attribute":
    case "Starred":
      return rewrite({ ...expression, value: expr(expression.value) });
    case "Subscript":
      return rewrite({
        ...expression,
        value: expr(expression.value),
        index: expr(expression.index),
      });
    case "Slice":
      return rewrite({
        ...expression,
        lower: optional(expression.lower),
        upper: optional(expression.upper),
        step: optional(expression.step),
      });
    case "Call":
      return rewrite({
        ...expression,
        func: expr(expression.func),
        args: expression.args.map(expr),
        keywords: expression.keywords.map((keyword) => ({
          ...keyword,
          value: expr(keyword.value),
        })),
      });
    case "BinOp":
      return rewrite({
        ...expression,
        left: expr(expression.left),
        right: expr(expression.right),
      });
    case "UnaryOp":
      return rewrite({ ...expression, operand: expr(expression.operand) });
    case "BoolOp":
      return rewrite({ ...expression, values: expression.values.map(expr) });
    case "Compare":
      return rewrite({
        ...expression,
        left: expr(expression.left),
        comparators: expression.comparators.map(expr),
      });
    case "List":
    case "Tuple":
      return rewrite({
        ...expression,
        elements: expression.elements.map(expr),
      });
    case "Dict":
      return rewrite({
        ...expression,
        keys: expression.keys.map(expr),
        values: expression.values.map(expr),
      });
    case "IfExp":
      return rewrite({
        ...expression,
        test: expr(expression.test),
        body: expr(expression.body),
        orelse: expr(expression.orelse),
      });
    default: {
      const unexpected: never = expression;
      return unexpected;
    }
  }
}
