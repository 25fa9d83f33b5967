/**
 * Concrete compilation sequences for different targets
 */

import { pass as parsingPass } from "../../parser/pass.js";
import { pass as normalizingPass } from "../../normalize/pass.js";
import { pass as translatingPass } from "../../translator/pass.js";
import { pass as formattingPass } from "../../ir/pass.js";

export const passes = {
  parsing: parsingPass,
  normalizing: normalizingPass,
  translating: translatingPass,
  formatting: formattingPass,
} as const;

// Ordered list of targets; each one runs every pass of the ones before it
export const targets = ["ast", "ir", "text"] as const;

export type Target = (typeof targets)[number];

export const isTarget = (value: string): value is Target =>
  targets.some((target) => target === value);
