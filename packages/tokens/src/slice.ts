/**
 * Token slices
 *
 * A TokenSlice is a window over an existing token array. Captures made while
 * matching hold slices; the underlying tokens are only copied when output is
 * produced.
 */

import { joinSpans, type Span } from "@tokenrules/core";
import type { TokenTree } from "./token.js";

export class TokenSlice implements Iterable<TokenTree> {
  readonly source: readonly TokenTree[];
  readonly start: number;
  readonly end: number;

  constructor(source: readonly TokenTree[], start = 0, end = source.length) {
    if (start < 0 || end > source.length || start > end) {
      throw new RangeError(`TokenSlice: invalid range ${start}..${end} over ${source.length} tokens`);
    }
    this.source = source;
    this.start = start;
    this.end = end;
  }

  static of(tokens: readonly TokenTree[]): TokenSlice {
    return new TokenSlice(tokens);
  }

  get length(): number {
    return this.end - this.start;
  }

  get isEmpty(): boolean {
    return this.start === this.end;
  }

  at(index: number): TokenTree | undefined {
    if (index < 0 || index >= this.length) return undefined;
    return this.source[this.start + index];
  }

  /**
   * A sub-view; indices are relative to this slice.
   */
  slice(start: number, end: number = this.length): TokenSlice {
    return new TokenSlice(this.source, this.start + start, this.start + Math.min(end, this.length));
  }

  /**
   * Copy the viewed tokens into a fresh array.
   */
  toArray(): TokenTree[] {
    return this.source.slice(this.start, this.end);
  }

  /** Span covering the first through last token, if any */
  get span(): Span | undefined {
    const first = this.at(0);
    const last = this.at(this.length - 1);
    if (!first || !last) return undefined;
    return joinSpans(first.span, last.span);
  }

  *[Symbol.iterator](): Iterator<TokenTree> {
    for (let i = this.start; i < this.end; i++) {
      yield this.source[i];
    }
  }
}
