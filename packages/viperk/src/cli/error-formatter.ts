/**
 * Diagnostic formatting for the terminal
 */

import { SourceLines } from "#ast";
import type { ViperkError } from "#errors";

/**
 * Format an error with the offending source line and a caret under the
 * column it points at
 */
export function formatError(
  error: ViperkError,
  source?: string,
  sourcePath?: string,
): string {
  const header = `${error.severity} ${error.code}: ${error.message}`;
  const { location } = error;
  if (!location || source === undefined) {
    return header;
  }

  const lineNumber = String(location.line);
  const gutter = " ".repeat(lineNumber.length);
  const text = new SourceLines(source).line(location.line);
  const place = `${sourcePath ?? "<input>"}:${location.line}:${location.column + 1}`;

  return [
    header,
    `${gutter}--> ${place}`,
    `${gutter} |`,
    `${lineNumber} | ${text}`,
    `${gutter} | ${" ".repeat(location.column)}^`,
  ].join("\n");
}
