/**
 * Token-level parser combinators for @tokenrules/fragments
 *
 * All combinators return `TokenParser<T>` values that can be composed freely.
 * PEG semantics: ordered alternation, first match wins. Positions are indices
 * into the token array; a delimited group counts as one token.
 */

import {
  CLOSE_DELIMITERS,
  OPEN_DELIMITERS,
  describeToken,
  type Delimiter,
  type IdentToken,
  type LiteralToken,
  type PunctToken,
  type TokenTree,
} from "@tokenrules/tokens";
import type { ParseFailure, ParseResult, TokenParser } from "./types.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Create a TokenParser<T> from a raw parse function. */
export function parser<T>(
  parseFn: (input: readonly TokenTree[], pos: number) => ParseResult<T>,
): TokenParser<T> {
  return {
    parse(input: readonly TokenTree[], pos = 0): ParseResult<T> {
      return parseFn(input, pos);
    },
    parseAll(input: readonly TokenTree[]): T {
      const result = parseFn(input, 0);
      if (!result.ok) {
        throw new TokenParseError(input, result.pos, result.expected);
      }
      if (result.pos !== input.length) {
        throw new TokenParseError(input, result.pos, "end of input");
      }
      return result.value;
    },
  };
}

export function ok<T>(value: T, pos: number): ParseResult<T> {
  return { ok: true, value, pos };
}

export function fail<T>(pos: number, expected: string): ParseResult<T> {
  return { ok: false, pos, expected };
}

/** Re-type a failure for a parser with a different result type. */
export function propagate<T>(failure: ParseFailure): ParseResult<T> {
  return fail(failure.pos, failure.expected);
}

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

/** Descriptive parse error with token position context. */
export class TokenParseError extends Error {
  /** Index of the token where parsing failed. */
  readonly pos: number;
  /** What the parser expected at the failure position. */
  readonly expected: string;

  constructor(input: readonly TokenTree[], pos: number, expected: string) {
    super(`Parse error at token ${pos}: expected ${expected}, found ${describeToken(input[pos])}`);
    this.name = "TokenParseError";
    this.pos = pos;
    this.expected = expected;
  }
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

/** Match a punctuation token with the exact spelling. */
export function punct(text: string): TokenParser<PunctToken> {
  return parser((input, pos) => {
    const token = input[pos];
    if (token?.kind === "punct" && token.text === text) {
      return ok(token, pos + 1);
    }
    return fail(pos, `\`${text}\``);
  });
}

/** Match an identifier token with the exact spelling. */
export function keyword(text: string): TokenParser<IdentToken> {
  return parser((input, pos) => {
    const token = input[pos];
    if (token?.kind === "ident" && token.text === text) {
      return ok(token, pos + 1);
    }
    return fail(pos, `\`${text}\``);
  });
}

/** Match any identifier whose spelling is not in `reserved`. */
export function identifier(reserved: ReadonlySet<string> = new Set()): TokenParser<IdentToken> {
  return parser((input, pos) => {
    const token = input[pos];
    if (token?.kind === "ident" && !reserved.has(token.text)) {
      return ok(token, pos + 1);
    }
    return fail(pos, "identifier");
  });
}

export function literalToken(): TokenParser<LiteralToken> {
  return parser((input, pos) => {
    const token = input[pos];
    if (token?.kind === "literal") {
      return ok(token, pos + 1);
    }
    return fail(pos, "literal");
  });
}

/** Match any single token tree. */
export function anyToken(): TokenParser<TokenTree> {
  return parser((input, pos) => {
    const token = input[pos];
    if (token) {
      return ok(token, pos + 1);
    }
    return fail(pos, "token tree");
  });
}

/**
 * Match a delimited group whose contents `inner` consumes entirely. A failure
 * inside the group is reported at the group's own position.
 */
export function group<T>(delimiter: Delimiter, inner: TokenParser<T>): TokenParser<T> {
  const open = OPEN_DELIMITERS[delimiter];
  return parser((input, pos) => {
    const token = input[pos];
    if (token?.kind !== "group" || token.delimiter !== delimiter) {
      return fail(pos, `\`${open}\``);
    }
    const r = inner.parse(token.tokens, 0);
    if (!r.ok) return fail(pos, r.expected);
    if (r.pos !== token.tokens.length) {
      return fail(pos, `end of \`${open}...${CLOSE_DELIMITERS[delimiter]}\` group, found ${describeToken(token.tokens[r.pos])}`);
    }
    return ok(r.value, pos + 1);
  });
}

/** Match end of input. */
export function eof(): TokenParser<null> {
  return parser((input, pos) => {
    if (pos >= input.length) {
      return ok(null, pos);
    }
    return fail(pos, "end of input");
  });
}

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/** Sequence two parsers. */
export function seq<A, B>(a: TokenParser<A>, b: TokenParser<B>): TokenParser<[A, B]> {
  return parser((input, pos) => {
    const ra = a.parse(input, pos);
    if (!ra.ok) return propagate(ra);
    const rb = b.parse(input, ra.pos);
    if (!rb.ok) return propagate(rb);
    return ok<[A, B]>([ra.value, rb.value], rb.pos);
  });
}

/** Sequence three parsers. */
export function seq3<A, B, C>(
  a: TokenParser<A>,
  b: TokenParser<B>,
  c: TokenParser<C>,
): TokenParser<[A, B, C]> {
  return parser((input, pos) => {
    const ra = a.parse(input, pos);
    if (!ra.ok) return propagate(ra);
    const rb = b.parse(input, ra.pos);
    if (!rb.ok) return propagate(rb);
    const rc = c.parse(input, rb.pos);
    if (!rc.ok) return propagate(rc);
    return ok<[A, B, C]>([ra.value, rb.value, rc.value], rc.pos);
  });
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/**
 * Ordered alternation (PEG): the first parser that succeeds wins. On failure
 * the furthest failure is reported; equally far failures have their
 * expectations joined.
 */
export function alt<T>(...parsers: TokenParser<T>[]): TokenParser<T> {
  return parser((input, pos) => {
    let furthest = pos;
    let expected: string[] = [];
    for (const p of parsers) {
      const r = p.parse(input, pos);
      if (r.ok) return r;
      if (r.pos > furthest) {
        furthest = r.pos;
        expected = [r.expected];
      } else if (r.pos === furthest) {
        expected.push(r.expected);
      }
    }
    return fail(furthest, expected.length > 0 ? expected.join(" or ") : "nothing");
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/** Zero or more repetitions. Always succeeds. */
export function many<T>(p: TokenParser<T>): TokenParser<T[]> {
  return parser((input, pos) => {
    const results: T[] = [];
    let cur = pos;
    for (;;) {
      const r = p.parse(input, cur);
      if (!r.ok) break;
      if (r.pos === cur) break; // zero-width match
      results.push(r.value);
      cur = r.pos;
    }
    return ok(results, cur);
  });
}

/** One or more repetitions. */
export function many1<T>(p: TokenParser<T>): TokenParser<T[]> {
  return parser((input, pos) => {
    const first = p.parse(input, pos);
    if (!first.ok) return propagate(first);
    const rest = many(p).parse(input, first.pos);
    if (!rest.ok) return propagate(rest);
    return ok([first.value, ...rest.value], rest.pos);
  });
}

/** Optional: succeed with `null` if `p` fails. */
export function optional<T>(p: TokenParser<T>): TokenParser<T | null> {
  return parser<T | null>((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok) return r;
    return ok(null, pos);
  });
}

// ---------------------------------------------------------------------------
// Lookahead / negation
// ---------------------------------------------------------------------------

/** Negative lookahead: succeed with null only if `p` fails here. Consumes nothing. */
export function not<T>(p: TokenParser<T>): TokenParser<null> {
  return parser((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok) return fail(pos, `not ${describeToken(input[pos])}`);
    return ok(null, pos);
  });
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: TokenParser<A>, f: (a: A) => B): TokenParser<B> {
  return parser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return propagate(r);
    return ok(f(r.value), r.pos);
  });
}

/** Discard a parser's value; recognizers only care where a fragment ends. */
export function skip<T>(p: TokenParser<T>): TokenParser<null> {
  return map(p, () => null);
}

// ---------------------------------------------------------------------------
// Separation combinators
// ---------------------------------------------------------------------------

/** Zero or more items separated by `sep`; a trailing separator is left unconsumed. */
export function sepBy<T, S>(item: TokenParser<T>, sep: TokenParser<S>): TokenParser<T[]> {
  return parser((input, pos) => {
    const first = item.parse(input, pos);
    if (!first.ok) return ok([], pos);
    const results: T[] = [first.value];
    let cur = first.pos;
    for (;;) {
      const rs = sep.parse(input, cur);
      if (!rs.ok) break;
      const ri = item.parse(input, rs.pos);
      if (!ri.ok) break;
      results.push(ri.value);
      cur = ri.pos;
    }
    return ok(results, cur);
  });
}

/**
 * Zero or more items separated by `sep`, with an optional trailing separator.
 * An item that fails after consuming tokens fails the whole list.
 */
export function sepEndBy<T, S>(item: TokenParser<T>, sep: TokenParser<S>): TokenParser<T[]> {
  return parser((input, pos) => {
    const results: T[] = [];
    let cur = pos;
    for (;;) {
      if (cur >= input.length) break;
      const ri = item.parse(input, cur);
      if (!ri.ok) {
        if (ri.pos === cur) break;
        return propagate(ri);
      }
      results.push(ri.value);
      cur = ri.pos;
      const rs = sep.parse(input, cur);
      if (!rs.ok) break;
      cur = rs.pos;
    }
    return ok(results, cur);
  });
}

/** Parse `p` between `open` and `close`, returning only the inner result. */
export function between<O, T, C>(
  open: TokenParser<O>,
  p: TokenParser<T>,
  close: TokenParser<C>,
): TokenParser<T> {
  return parser((input, pos) => {
    const ro = open.parse(input, pos);
    if (!ro.ok) return propagate(ro);
    const rp = p.parse(input, ro.pos);
    if (!rp.ok) return rp;
    const rc = close.parse(input, rp.pos);
    if (!rc.ok) return propagate(rc);
    return ok(rp.value, rc.pos);
  });
}

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<T>(f: () => TokenParser<T>): TokenParser<T> {
  let cached: TokenParser<T> | null = null;
  return parser((input, pos) => {
    if (!cached) cached = f();
    return cached.parse(input, pos);
  });
}
