import * as Ast from "#ast";
import type { Pass } from "#compiler";
import type { ViperkError } from "#errors";
import { Result } from "#result";

import { normalizeLiterals } from "./normalize.js";

/**
 * Literal-sign normalization pass
 */
export const pass: Pass<{
  needs: {
    ast: Ast.Module;
    source: string;
  };
  adds: {
    ast: Ast.Module;
  };
  error: ViperkError;
}> = {
  run({ ast, source }) {
    return Result.ok({
      ast: normalizeLiterals(ast, new Ast.SourceLines(source)),
    });
  },
};
