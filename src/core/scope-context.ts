import type { ScopeHandle } from "../interfaces/validation-sink.js";

/**
 * Handle returned by `beginScope`. Remembers the stack depth right after its
 * push; closing truncates the stack back below that depth.
 */
export class ScopeContext implements ScopeHandle {
  private depth: number;

  constructor(
    private readonly endScope: (depth: number) => void,
    depth: number,
  ) {
    this.depth = depth;
  }

  get closed(): boolean {
    return this.depth <= 0;
  }

  close(): void {
    if (this.closed) return;
    const depth = this.depth;
    this.depth = 0;
    this.endScope(depth);
  }
}
