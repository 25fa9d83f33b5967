/**
 * The `viperk` command
 */

import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import { compile, type Target } from "#compiler";
import type { ViperkError } from "#errors";
import { Result } from "#result";

import { compileOptions, parseOutputTarget, usage } from "./options.js";
import { displayErrors, formatJson, writeOutput } from "./output.js";

/**
 * Run the command on its arguments and return the exit code
 */
export function handleCompileCommand(args: string[]): number {
  let commandLine: CommandLine;
  try {
    commandLine = parseCommandLine(args);
  } catch (error) {
    console.error(`Error: ${messageOf(error)}`);
    console.error(usage());
    return 1;
  }
  const { values, positionals, target } = commandLine;

  if (values.help) {
    console.log(usage());
    return 0;
  }

  if (positionals.length !== 1) {
    console.error("One argument expected: the file name.");
    console.error(usage());
    return 1;
  }

  const [sourcePath] = positionals;
  let source: string;
  try {
    source = readFileSync(sourcePath, "utf-8");
  } catch (error) {
    console.error(`Error: cannot read ${sourcePath}: ${messageOf(error)}`);
    return 1;
  }

  const result = render(target, {
    source,
    sourcePath,
    normalizeLiterals: !values["keep-negative-literals"],
  });

  if (!result.success) {
    displayErrors(Result.messages(result), source, sourcePath);
    return 1;
  }

  try {
    writeOutput(result.value, values.output);
  } catch (error) {
    console.error(`Error: cannot write output: ${messageOf(error)}`);
    return 1;
  }
  return 0;
}

function render(
  target: Target,
  options: { source: string; sourcePath: string; normalizeLiterals: boolean },
): Result<string, ViperkError> {
  switch (target) {
    case "ast":
      return Result.map(compile({ to: "ast", ...options }), ({ ast }) =>
        formatJson(ast),
      );
    case "ir":
      return Result.map(compile({ to: "ir", ...options }), ({ ir }) =>
        formatJson(ir),
      );
    case "text":
      return Result.map(compile({ to: "text", ...options }), ({ text }) => text);
  }
}

type CommandLine = ReturnType<typeof parseCommandLine>;

function parseCommandLine(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: compileOptions,
    allowPositionals: true,
  });
  const target = parseOutputTarget(values.target ?? "text");
  return { values, positionals, target };
}

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
