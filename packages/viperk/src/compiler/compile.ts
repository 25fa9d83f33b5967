/**
 * Compile Viper source up to a target
 */

import type * as Ast from "#ast";
import type * as Ir from "#ir";
import type { ViperkError } from "#errors";
import { Result } from "#result";

import { runPass } from "./sequence.js";
import { passes, type Target } from "./sequences/index.js";

export interface CompileOptions<T extends Target = Target> {
  to: T;
  source: string;
  sourcePath?: string;
  /**
   * Fold `-<literal>` into negative literals before translating
   * (default: true)
   */
  normalizeLiterals?: boolean;
}

export interface CompileInput {
  source: string;
  sourcePath?: string;
}

export interface CompileOutputs {
  ast: CompileInput & { ast: Ast.Module };
  ir: CompileInput & { ast: Ast.Module; ir: Ir.Program };
  text: CompileInput & { ast: Ast.Module; ir: Ir.Program; text: string };
}

export type CompileOutput<T extends Target> = CompileOutputs[T];

/**
 * Run the passes needed for `options.to`, stopping at the first failure
 */
export function compile(
  options: CompileOptions<"ast">,
): Result<CompileOutput<"ast">, ViperkError>;
export function compile(
  options: CompileOptions<"ir">,
): Result<CompileOutput<"ir">, ViperkError>;
export function compile(
  options: CompileOptions<"text">,
): Result<CompileOutput<"text">, ViperkError>;
export function compile(
  options: CompileOptions,
): Result<CompileOutput<Target>, ViperkError>;
export function compile(
  options: CompileOptions,
): Result<CompileOutput<Target>, ViperkError> {
  const input: CompileInput = { source: options.source };
  if (options.sourcePath !== undefined) {
    input.sourcePath = options.sourcePath;
  }

  const parsed = runPass(Result.ok(input), passes.parsing);
  const normalized =
    options.normalizeLiterals === false
      ? parsed
      : runPass(parsed, passes.normalizing);
  if (options.to === "ast") {
    return normalized;
  }

  const translated = runPass(normalized, passes.translating);
  if (options.to === "ir") {
    return translated;
  }

  return runPass(translated, passes.formatting);
}
