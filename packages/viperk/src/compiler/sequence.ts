import type { ViperkError } from "#errors";
import { Severity, type MessagesBySeverity, type Result } from "#result";

import type { Adds, Needs, Pass, PassConfig } from "./pass.js";

/**
 * Run a pass on the accumulated state of the passes before it
 *
 * The pass's output is merged into the state; messages from every pass
 * are kept. A failed state is passed through untouched.
 */
export function runPass<S extends Needs<C>, C extends PassConfig>(
  state: Result<S, ViperkError>,
  pass: Pass<C>,
): Result<S & Adds<C>, ViperkError> {
  if (!state.success) {
    return state;
  }

  const result = pass.run(state.value);
  const messages = mergeMessages(state.messages, result.messages);
  if (!result.success) {
    return { success: false, messages };
  }
  return {
    success: true,
    value: { ...state.value, ...result.value },
    messages,
  };
}

function mergeMessages(
  ...groups: MessagesBySeverity<ViperkError>[]
): MessagesBySeverity<ViperkError> {
  const merged: MessagesBySeverity<ViperkError> = {};
  for (const group of groups) {
    for (const severity of Object.values(Severity)) {
      const messages = group[severity];
      if (messages && messages.length > 0) {
        (merged[severity] ??= []).push(...messages);
      }
    }
  }
  return merged;
}
