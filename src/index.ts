/**
 * validation-logger public API barrel.
 * @module
 */

// Adapters
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Core
export { LogMessage } from "./core/log-message.js";
export { renderReport } from "./core/report-renderer.js";
export type { SingleValidationLevel } from "./core/validation-level.js";
export {
  DEFAULT_ENABLED_LEVELS,
  formatLevels,
  isSingleLevel,
  levelName,
  parseLevels,
  ValidationLevel,
} from "./core/validation-level.js";
export { ValidationLogger } from "./core/validation-logger.js";
// Errors
export {
  ConfigurationError,
  errorMessage,
  InvalidArgumentError,
  ValidationLoggerError,
} from "./errors.js";
// Interfaces
export type { Logger } from "./interfaces/logger.js";
export type { ScopeHandle, ValidationSink } from "./interfaces/validation-sink.js";
// Config
export type { ResolvedOptions, ValidationLoggerOptions } from "./types/config.js";
export { DEFAULT_OPTIONS, resolveOptions } from "./types/config.js";
// Utils
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
