import type { Module } from "#ast";
import type { Pass } from "#compiler";
import { Result } from "#result";

import type { Error as ParseError } from "./errors.js";
import { parse } from "./parser.js";

/**
 * Parsing pass - converts source text to a syntax tree
 */
export const pass: Pass<{
  needs: {
    source: string;
    sourcePath?: string;
  };
  adds: {
    ast: Module;
  };
  error: ParseError;
}> = {
  run({ source }) {
    const result = parse(source);
    return Result.map(result, (ast) => ({ ast }));
  },
};
