/**
 * Contract that validators write messages through.
 * ValidationLogger implements it; validator code programs to it.
 * @module
 */

import type { ValidationLevel } from "../core/validation-level.js";

/** Handle for an open scope. Closing more than once is a no-op. */
export interface ScopeHandle {
  close(): void;
}

export interface ValidationSink {
  beginScope(name: string): ScopeHandle;
  log(level: ValidationLevel, propertyName: string, message: string): void;
  readonly enabledLevels: ValidationLevel;
  isEnabled(level: ValidationLevel): boolean;
}
