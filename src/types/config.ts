import { validationLoggerOptionsSchema } from "../config/config-schema.js";
import {
  DEFAULT_ENABLED_LEVELS,
  parseLevels,
  type ValidationLevel,
} from "../core/validation-level.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

/** ValidationLogger construction options */
export interface ValidationLoggerOptions {
  /** Levels recorded from the start (default: Information | Warning | Error) */
  enabledLevels?: ValidationLevel | string | readonly string[];
  /** Receives every recorded message as it is logged (default: no-op) */
  logger?: Logger;
}

/** Options with defaults applied and level names parsed into a mask. */
export interface ResolvedOptions {
  enabledLevels: ValidationLevel;
  logger: Logger;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  enabledLevels: DEFAULT_ENABLED_LEVELS,
  logger: noopLogger,
};

function resolveLevels(value: ValidationLoggerOptions["enabledLevels"]): ValidationLevel {
  if (value === undefined) return DEFAULT_OPTIONS.enabledLevels;
  if (typeof value === "number") return value;
  try {
    return parseLevels(value);
  } catch (err) {
    throw new ConfigurationError(`Invalid configuration: ${errorMessage(err)}`, { cause: err });
  }
}

export function resolveOptions(options: ValidationLoggerOptions = {}): ResolvedOptions {
  const validation = validationLoggerOptionsSchema.safeParse(options);
  if (!validation.success) {
    throw new ConfigurationError(`Invalid configuration: ${validation.error.message}`);
  }

  return {
    enabledLevels: resolveLevels(options.enabledLevels),
    logger: options.logger ?? DEFAULT_OPTIONS.logger,
  };
}
