/**
 * Recursion guard
 *
 * Nested expansions are tracked on an explicit, size-checked stack rather
 * than the host call stack, so the depth limit holds for any input.
 */

import type { ExpansionFrame } from "./types.js";

/**
 * @throws RangeError unless `limit` is a positive integer
 */
export function assertRecursionLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`recursion limit must be a positive integer, got ${limit}`);
  }
}

export class ExpansionStack {
  private readonly frames: ExpansionFrame[] = [];

  constructor(readonly limit: number) {
    assertRecursionLimit(limit);
  }

  get depth(): number {
    return this.frames.length;
  }

  get isFull(): boolean {
    return this.frames.length >= this.limit;
  }

  /**
   * @returns false, leaving the stack unchanged, when it already holds `limit` frames
   */
  push(frame: ExpansionFrame): boolean {
    if (this.isFull) return false;
    this.frames.push(frame);
    return true;
  }

  pop(): ExpansionFrame | undefined {
    return this.frames.pop();
  }

  top(): ExpansionFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  /** Record which rule the innermost expansion selected. */
  selectRule(ruleIndex: number): void {
    const top = this.frames.pop();
    if (top) this.frames.push({ ...top, ruleIndex });
  }

  /** Active frames, oldest first */
  chain(): ExpansionFrame[] {
    return [...this.frames];
  }

  clear(): void {
    this.frames.length = 0;
  }
}
