/**
 * Severity flags for validation messages.
 *
 * Levels are bit flags so a logger can be enabled for any subset of them,
 * e.g. `ValidationLevel.Warning | ValidationLevel.Error`.
 * @module
 */

import { InvalidArgumentError } from "../errors.js";

export enum ValidationLevel {
  /** No messages. */
  None = 0,
  /** Verbose tracing of the validation pass itself. */
  Trace = 1,
  /** Diagnostics about the validator rather than the validated item. */
  Debug = 2,
  /** Facts about the item that do not bear on its validity. */
  Information = 4,
  /** A tolerable problem, or one the validator corrected unambiguously. */
  Warning = 8,
  /** The item failed validation. */
  Error = 16,
  All = 31,
}

/** One of the five levels a message can actually be logged at. */
export type SingleValidationLevel =
  | ValidationLevel.Trace
  | ValidationLevel.Debug
  | ValidationLevel.Information
  | ValidationLevel.Warning
  | ValidationLevel.Error;

export const DEFAULT_ENABLED_LEVELS: ValidationLevel =
  ValidationLevel.Information | ValidationLevel.Warning | ValidationLevel.Error;

const LEVEL_NAMES: Record<SingleValidationLevel, string> = {
  [ValidationLevel.Trace]: "Trace",
  [ValidationLevel.Debug]: "Debug",
  [ValidationLevel.Information]: "Information",
  [ValidationLevel.Warning]: "Warning",
  [ValidationLevel.Error]: "Error",
};

const SINGLE_LEVELS: readonly SingleValidationLevel[] = [
  ValidationLevel.Trace,
  ValidationLevel.Debug,
  ValidationLevel.Information,
  ValidationLevel.Warning,
  ValidationLevel.Error,
];

const NAME_ALIASES = new Map<string, ValidationLevel>([
  ["none", ValidationLevel.None],
  ["trace", ValidationLevel.Trace],
  ["debug", ValidationLevel.Debug],
  ["information", ValidationLevel.Information],
  ["info", ValidationLevel.Information],
  ["warning", ValidationLevel.Warning],
  ["warn", ValidationLevel.Warning],
  ["error", ValidationLevel.Error],
  ["all", ValidationLevel.All],
]);

export function isSingleLevel(value: number): value is SingleValidationLevel {
  return SINGLE_LEVELS.some((level) => level === value);
}

export function levelName(level: SingleValidationLevel): string {
  return LEVEL_NAMES[level];
}

/**
 * Describe a mask the way flags are conventionally printed:
 * `"Warning, Error"`, `"None"`, `"All"`. Bits outside `All` are ignored, so
 * `parseLevels(formatLevels(mask))` is `mask & All`.
 */
export function formatLevels(mask: number): string {
  const known = mask & ValidationLevel.All;
  if (known === ValidationLevel.None) return "None";
  if (known === ValidationLevel.All) return "All";

  const parts: string[] = [];
  for (const level of SINGLE_LEVELS) {
    if ((known & level) !== 0) parts.push(LEVEL_NAMES[level]);
  }
  return parts.join(", ");
}

/**
 * Parse level names into a mask. A single string may separate names with
 * `,` or `|`; matching is case-insensitive.
 */
export function parseLevels(input: string | readonly string[]): ValidationLevel {
  const names = typeof input === "string" ? input.split(/[,|]/) : input;

  let mask: ValidationLevel = ValidationLevel.None;
  for (const raw of names) {
    const name = raw.trim().toLowerCase();
    if (name === "") continue;
    const level = NAME_ALIASES.get(name);
    if (level === undefined) {
      throw new InvalidArgumentError(`Unknown validation level "${raw.trim()}"`, "input");
    }
    mask |= level;
  }
  return mask;
}
