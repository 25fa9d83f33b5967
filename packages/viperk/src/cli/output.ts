import { writeFileSync } from "node:fs";

import type { ViperkError } from "#errors";

import { formatError } from "./error-formatter.js";

/**
 * Write the result to a file, or to stdout when no path is given
 */
export function writeOutput(content: string, outputPath?: string): void {
  if (outputPath) {
    writeFileSync(outputPath, `${content}\n`);
  } else {
    console.log(content);
  }
}

export function displayErrors(
  errors: ViperkError[],
  source?: string,
  sourcePath?: string,
): void {
  for (const error of errors) {
    console.error(formatError(error, source, sourcePath));
  }
}

// Syntax trees hold integers as bigint, which JSON has no notation for
export function formatJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, inner: unknown) =>
      typeof inner === "bigint" ? inner.toString() : inner,
    2,
  );
}
