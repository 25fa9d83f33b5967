/**
 * Syntax tree to IR translation
 */

export { translate } from "./translate.js";
export { translateProgram, FUNCTION_BODY_DEPTH } from "./program.js";
export { translateBlock, translateStatement } from "./statements.js";
export {
  translateExpression,
  translateExpressions,
  translateVariable,
} from "./expressions.js";
export { translateType, translateUnit } from "./types.js";
export { translateNumber, toFixed10, FIXED10_PRECISION } from "./literals.js";
export * from "./errors.js";
