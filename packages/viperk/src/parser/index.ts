/**
 * Parser for Viper source
 *
 * Exports the tokenizer and the parser implementation
 */

export { parse, parser } from "./parser.js";
export { tokenize, Token, KEYWORDS, type TokenType } from "./lexer.js";
export * from "./errors.js";
