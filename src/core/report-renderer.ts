/**
 * Renders a flat, ordered message list as a brace-nested text report.
 *
 * Scopes are reconstructed by diffing each message's scope path against the
 * previous one: scopes past the common prefix are closed, new ones opened.
 * Each nesting level indents by two spaces.
 * @module
 */

import type { LogMessage } from "./log-message.js";
import { levelName } from "./validation-level.js";

const INDENT = "  ";

/** Length of the longest common prefix, compared ordinally. */
function commonPrefixLength(a: readonly string[], b: readonly string[]): number {
  const max = Math.min(a.length, b.length);
  let i = 0;
  while (i < max && a[i] === b[i]) i++;
  return i;
}

function closeScopes(lines: string[], from: number, to: number): void {
  for (let level = from; level > to; level--) {
    lines.push(`${INDENT.repeat(level - 1)}}`);
  }
}

export function renderReport(messages: readonly LogMessage[]): string {
  const lines: string[] = [];
  let scope: readonly string[] = [];

  for (const entry of messages) {
    const match = commonPrefixLength(scope, entry.scope);
    closeScopes(lines, scope.length, match);

    scope = entry.scope;
    for (let i = match; i < scope.length; i++) {
      lines.push(`${INDENT.repeat(i)}${scope[i]} {`);
    }

    lines.push(
      `${INDENT.repeat(scope.length)}${levelName(entry.level)}: ${entry.propertyName}: ${entry.message}`,
    );
  }
  closeScopes(lines, scope.length, 0);

  return lines.map((line) => `${line}\n`).join("");
}
