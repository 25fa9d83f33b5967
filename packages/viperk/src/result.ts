/**
 * Result type for fallible compiler stages
 *
 * A stage either succeeds with a value or fails; either way it may carry
 * messages grouped by severity.
 */

import type { ViperkError } from "#errors";

export enum Severity {
  Error = "error",
}

export type MessagesBySeverity<E extends ViperkError> = {
  [S in Severity]?: E[];
};

export type Result<T, E extends ViperkError> =
  | {
      success: true;
      value: T;
      messages: MessagesBySeverity<E>;
    }
  | {
      success: false;
      messages: MessagesBySeverity<E>;
    };

export namespace Result {
  export function ok<T, E extends ViperkError = never>(value: T): Result<T, E> {
    return { success: true, value, messages: {} };
  }

  export function err<T = never, E extends ViperkError = ViperkError>(
    error: E | E[],
  ): Result<T, E> {
    const errors = Array.isArray(error) ? error : [error];
    const messages: MessagesBySeverity<E> = {};
    for (const e of errors) {
      (messages[e.severity] ??= []).push(e);
    }
    return { success: false, messages };
  }

  export function map<T, U, E extends ViperkError>(
    result: Result<T, E>,
    fn: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return { success: true, value: fn(result.value), messages: result.messages };
  }

  /**
   * All messages of a result, in severity order
   */
  export function messages<E extends ViperkError>(
    result: Result<unknown, E>,
  ): E[] {
    return Object.values(Severity).flatMap(
      (severity) => result.messages[severity] ?? [],
    );
  }

  export function firstError<E extends ViperkError>(
    result: Result<unknown, E>,
  ): E | undefined {
    return result.messages[Severity.Error]?.[0];
  }
}
