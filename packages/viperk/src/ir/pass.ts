import type { Pass } from "#compiler";
import type { ViperkError } from "#errors";
import { Result } from "#result";

import type { Program } from "./spec/index.js";
import { formatProgram } from "./formatter.js";

/**
 * Formatting pass - renders IR as prefix-notation text
 */
export const pass: Pass<{
  needs: {
    ir: Program;
  };
  adds: {
    text: string;
  };
  error: ViperkError;
}> = {
  run({ ir }) {
    return Result.ok({ text: formatProgram(ir) });
  },
};
