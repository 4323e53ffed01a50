import type { SingleValidationLevel } from "./validation-level.js";

/** One recorded message, with the scope path that was open when it was logged. */
export class LogMessage {
  readonly scope: readonly string[];

  constructor(
    scope: readonly string[],
    readonly level: SingleValidationLevel,
    readonly propertyName: string,
    readonly message: string,
  ) {
    // Copied: the live scope stack keeps changing after the entry is recorded.
    this.scope = Object.freeze([...scope]);
  }
}
