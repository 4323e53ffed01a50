export class ValidationLoggerError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidationLoggerError";
    this.code = code;
  }
}

// ── Domain errors ──

/** A caller passed a value outside an operation's accepted domain. */
export class InvalidArgumentError extends ValidationLoggerError {
  readonly paramName: string;

  constructor(message: string, paramName: string, options?: ErrorOptions) {
    super(message, "INVALID_ARGUMENT", options);
    this.name = "InvalidArgumentError";
    this.paramName = paramName;
  }
}

export class ConfigurationError extends ValidationLoggerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIGURATION", options);
    this.name = "ConfigurationError";
  }
}

// ── Utilities ──

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
