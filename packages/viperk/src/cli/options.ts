/**
 * Command line options
 */

import { isTarget, targets, type Target } from "#compiler";

export const compileOptions = {
  help: { type: "boolean", short: "h" },
  target: { type: "string", short: "t", default: "text" },
  output: { type: "string", short: "o" },
  "keep-negative-literals": { type: "boolean", default: false },
} as const;

type OptionName = keyof typeof compileOptions;

const optionNames: OptionName[] = [
  "help",
  "target",
  "output",
  "keep-negative-literals",
];

const optionDescriptions: Record<OptionName, string> = {
  help: "Show this help message",
  target: "Stop after text (IR), ir (IR as JSON) or ast (syntax tree as JSON)",
  output: "Write the result to a file instead of stdout",
  "keep-negative-literals": "Do not fold -<literal> into negative literals",
};

export function parseOutputTarget(value: string): Target {
  if (isTarget(value)) {
    return value;
  }
  throw new Error(
    `Invalid target "${value}". Expected one of: ${targets.join(", ")}`,
  );
}

export function usage(name = "viperk"): string {
  const lines = [
    "Translate a Viper contract to prefix-notation IR",
    "",
    `Usage: ${name} [options] <file>`,
    "",
    "Options:",
  ];
  for (const option of optionNames) {
    const config = compileOptions[option];
    const short = "short" in config ? `-${config.short}, ` : "    ";
    const value = config.type === "string" ? ` <${option}>` : "";
    const flag = `--${option}${value}`.padEnd(28);
    lines.push(`  ${short}${flag} ${optionDescriptions[option]}`);
  }
  return lines.join("\n");
}
