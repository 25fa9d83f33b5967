/**
 * Parser-specific errors and error codes
 */

import { ViperkError } from "#errors";
import type { SourceLocation } from "#ast";

export enum ParseErrorCode {
  UNEXPECTED_CHARACTER = "PARSE001",
  UNEXPECTED_TOKEN = "PARSE002",
  INCONSISTENT_INDENTATION = "PARSE003",
  UNSUPPORTED_SYNTAX = "PARSE004",
  INVALID_LITERAL = "PARSE005",
}

/**
 * Parse errors
 *
 * The message leads with the 1-based line and column of the offending
 * token, followed by the detail.
 */
export class Error extends ViperkError {
  public readonly detail: string;

  constructor(code: ParseErrorCode, detail: string, location: SourceLocation) {
    super(
      `Parse error at line ${location.line}, column ${location.column + 1}: ${detail}`,
      code,
      location,
    );
    this.detail = detail;
  }
}
