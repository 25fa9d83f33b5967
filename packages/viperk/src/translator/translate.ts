import * as Ast from "#ast";
import type * as Ir from "#ir";
import { Result } from "#result";

import { UnsupportedConstruct } from "./errors.js";
import { translateProgram } from "./program.js";

/**
 * Translate a parsed contract to IR
 *
 * Translation stops at the first unsupported construct; no partial
 * program is returned.
 */
export function translate(
  module: Ast.Module,
  source: string | Ast.SourceLines,
): Result<Ir.Program, UnsupportedConstruct> {
  const lines =
    typeof source === "string" ? new Ast.SourceLines(source) : source;
  try {
    return Result.ok(translateProgram(module, lines));
  } catch (error) {
    if (error instanceof UnsupportedConstruct) {
      return Result.err(error);
    }
    throw error;
  }
}
