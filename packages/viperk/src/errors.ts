/**
 * Base error type shared by every stage of the translator
 */

import type { SourceLocation } from "#ast";
import { Severity } from "#result";

export class ViperkError extends Error {
  public readonly code: string;
  public readonly location?: SourceLocation;
  public readonly severity: Severity = Severity.Error;

  constructor(message: string, code: string, location?: SourceLocation) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.location = location;
  }
}
