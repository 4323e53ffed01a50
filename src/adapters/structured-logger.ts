/**
 * JSON-lines diagnostic logger.
 *
 * Pair it with ValidationLogger to stream recorded messages as they happen:
 *
 *   new ValidationLogger({ logger: new StructuredLogger({ component: "schema" }) })
 * @module
 */

import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

export interface StructuredLoggerOptions {
  /** Receives one serialized line per call (default: stderr) */
  writer?: (line: string) => void;
  /** Minimum level written (default: DEBUG) */
  level?: LogLevel;
  component?: string;
}

export class StructuredLogger implements Logger {
  private readonly write: (line: string) => void;
  private readonly minLevel: LogLevel;
  private readonly component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.write = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.minLevel = options.level ?? LogLevel.DEBUG;
    this.component = options.component;
  }

  /** Logger with the same writer and level, tagged with another component. */
  child(component: string): StructuredLogger {
    return new StructuredLogger({ writer: this.write, level: this.minLevel, component });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.minLevel) return;

    const time = new Date().toISOString();
    const record: Record<string, unknown> = { time, level: LEVEL_LABELS[level], msg };
    if (this.component) record.component = this.component;

    for (const [key, value] of Object.entries(ctx ?? {})) {
      if (value instanceof Error) {
        record[key] = value.message;
        record[`${key}Stack`] = value.stack;
      } else {
        record[key] = value;
      }
    }

    let line: string;
    try {
      line = JSON.stringify(record);
    } catch {
      // Circular or otherwise unserializable context
      line = JSON.stringify({ time, level: LEVEL_LABELS[level], msg, serializationError: true });
    }
    this.write(line);
  }
}
