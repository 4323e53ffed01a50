/**
 * Diagnostic logger contract.
 * StructuredLogger and NoopLogger implement this; ValidationLogger mirrors
 * recorded messages into whichever one it is given.
 * @module
 */

export interface Logger {
  debug?(msg: string, ctx?: Record<string, unknown>): void;
  info(msg: string, ctx?: Record<string, unknown>): void;
  warn(msg: string, ctx?: Record<string, unknown>): void;
  error(msg: string, ctx?: Record<string, unknown>): void;
}
