import type { Module } from "#ast";
import type { Pass } from "#compiler";
import type * as Ir from "#ir";
import { Result } from "#result";

import type { UnsupportedConstruct } from "./errors.js";
import { translate } from "./translate.js";

/**
 * Translation pass - converts the syntax tree to IR
 */
export const pass: Pass<{
  needs: {
    ast: Module;
    source: string;
  };
  adds: {
    ir: Ir.Program;
  };
  error: UnsupportedConstruct;
}> = {
  run({ ast, source }) {
    return Result.map(translate(ast, source), (ir) => ({ ir }));
  },
};
