export * from "./spec.js";
export { SourceLines } from "./source.js";
export {
  rewriteModule,
  rewriteStatement,
  rewriteExpression,
  type ExpressionRewrite,
} from "./rewrite.js";
