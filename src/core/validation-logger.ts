/**
 * Accumulates validation messages under nested scopes.
 *
 * Messages are filtered by an enabled-level mask and stored in order with a
 * snapshot of the scope stack. Warning and error counters advance on every
 * call, filtered or not; `loggedLevels` only reflects what was recorded.
 * @module
 */

import { InvalidArgumentError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ScopeHandle, ValidationSink } from "../interfaces/validation-sink.js";
import { resolveOptions, type ValidationLoggerOptions } from "../types/config.js";
import { LogMessage } from "./log-message.js";
import { renderReport } from "./report-renderer.js";
import { ScopeContext } from "./scope-context.js";
import { isSingleLevel, type SingleValidationLevel, ValidationLevel } from "./validation-level.js";

export class ValidationLogger implements ValidationSink {
  private readonly messages: LogMessage[] = [];
  private readonly scope: string[] = [];
  private readonly logger: Logger;
  private enabled: ValidationLevel;
  private logged: ValidationLevel = ValidationLevel.None;
  private errorCount = 0;
  private warningCount = 0;

  constructor(options: ValidationLoggerOptions = {}) {
    const resolved = resolveOptions(options);
    this.enabled = resolved.enabledLevels;
    this.logger = resolved.logger;
  }

  // ── Scopes ──

  beginScope(name: string): ScopeHandle {
    this.scope.push(name);
    return new ScopeContext((depth) => this.endScope(depth), this.scope.length);
  }

  /**
   * Run `fn` inside a scope named `name`. The scope is closed when `fn`
   * returns or throws.
   */
  withScope<T>(name: string, fn: () => T): T {
    const handle = this.beginScope(name);
    try {
      return fn();
    } finally {
      handle.close();
    }
  }

  get scopeDepth(): number {
    return this.scope.length;
  }

  private endScope(depth: number): void {
    if (depth <= 0 || this.scope.length < depth) return;
    this.scope.splice(depth - 1);
  }

  // ── Writing ──

  log(level: ValidationLevel, propertyName: string, message: string): void {
    if (!isSingleLevel(level)) {
      throw new InvalidArgumentError(
        "Must be Trace, Debug, Information, Warning, or Error",
        "level",
      );
    }

    if ((level & this.enabled) === 0) {
      this.count(level);
      return;
    }

    // Forwarded first: a throwing logger must leave no state behind.
    const entry = new LogMessage(this.scope, level, propertyName, message);
    this.forward(entry);

    this.count(level);
    this.logged |= level;
    this.messages.push(entry);
  }

  private count(level: SingleValidationLevel): void {
    if (level === ValidationLevel.Warning) this.warningCount++;
    else if (level === ValidationLevel.Error) this.errorCount++;
  }

  trace(propertyName: string, message: string): void {
    this.log(ValidationLevel.Trace, propertyName, message);
  }

  debug(propertyName: string, message: string): void {
    this.log(ValidationLevel.Debug, propertyName, message);
  }

  information(propertyName: string, message: string): void {
    this.log(ValidationLevel.Information, propertyName, message);
  }

  warning(propertyName: string, message: string): void {
    this.log(ValidationLevel.Warning, propertyName, message);
  }

  error(propertyName: string, message: string): void {
    this.log(ValidationLevel.Error, propertyName, message);
  }

  private forward(entry: LogMessage): void {
    const ctx = { property: entry.propertyName, scope: entry.scope };
    const level: SingleValidationLevel = entry.level;
    switch (level) {
      case ValidationLevel.Trace:
      case ValidationLevel.Debug:
        this.logger.debug?.(entry.message, ctx);
        break;
      case ValidationLevel.Information:
        this.logger.info(entry.message, ctx);
        break;
      case ValidationLevel.Warning:
        this.logger.warn(entry.message, ctx);
        break;
      case ValidationLevel.Error:
        this.logger.error(entry.message, ctx);
        break;
    }
  }

  // ── Filtering ──

  get enabledLevels(): ValidationLevel {
    return this.enabled;
  }

  set enabledLevels(levels: ValidationLevel) {
    this.enabled = levels;
  }

  isEnabled(level: ValidationLevel): boolean {
    return (level & this.enabled) !== 0;
  }

  // ── Results ──

  get loggedLevels(): ValidationLevel {
    return this.logged;
  }

  get errors(): number {
    return this.errorCount;
  }

  get warnings(): number {
    return this.warningCount;
  }

  get passedValidation(): boolean {
    return (this.logged & ValidationLevel.Error) === 0;
  }

  get hasWarning(): boolean {
    return (this.logged & ValidationLevel.Warning) !== 0;
  }

  hasFlag(level: ValidationLevel): boolean {
    return (this.logged & level) !== 0;
  }

  get logMessages(): readonly LogMessage[] {
    return this.messages;
  }

  render(): string {
    return renderReport(this.messages);
  }

  toString(): string {
    return this.render();
  }
}
