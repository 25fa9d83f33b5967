/**
 * Prefix-notation IR
 *
 * Term types for the translated contract and the text renderer.
 */

export * from "./spec/index.js";
export {
  formatProgram,
  formatBlock,
  formatStatement,
  formatType,
  formatUnit,
  formatExpression,
} from "./formatter.js";
