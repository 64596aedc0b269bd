/**
 * Core types for @tokenrules/fragments
 *
 * Defines the parse result, the token parser interface and the fragment
 * grammar boundary the matcher delegates to.
 */

import type { TokenTree } from "@tokenrules/tokens";

/** Result of a parse attempt: success with a value or failure with expected description. */
export type ParseResult<T> =
  | { ok: true; value: T; pos: number }
  | { ok: false; pos: number; expected: string };

export type ParseFailure = Extract<ParseResult<unknown>, { ok: false }>;

/** A parser is a function from (tokens, index) to ParseResult. */
export interface TokenParser<T> {
  /** Attempt to parse starting at `pos` (default 0). */
  parse(input: readonly TokenTree[], pos?: number): ParseResult<T>;
  /** Parse the full input, throwing if not consumed entirely. */
  parseAll(input: readonly TokenTree[]): T;
}

export type FragmentSpecifier =
  | "expr"
  | "ident"
  | "literal"
  | "ty"
  | "path"
  | "pat"
  | "stmt"
  | "block"
  | "tt"
  | "vis";

export const FRAGMENT_SPECIFIERS: readonly FragmentSpecifier[] = [
  "expr",
  "ident",
  "literal",
  "ty",
  "path",
  "pat",
  "stmt",
  "block",
  "tt",
  "vis",
];

export function isFragmentSpecifier(name: string): name is FragmentSpecifier {
  return FRAGMENT_SPECIFIERS.some((specifier) => specifier === name);
}

export type FragmentResult = { ok: true; end: number } | { ok: false; pos: number; expected: string };

/**
 * Recognizes one fragment kind inside a token sequence.
 *
 * `canBegin` is a one-token lookahead: when it is false the matcher treats
 * the metavariable as a plain mismatch and may try the next rule. Once a
 * fragment has begun, a `parse` failure is a syntax error in the invocation.
 */
export interface FragmentGrammar {
  canBegin(tokens: readonly TokenTree[], pos: number): boolean;
  parse(tokens: readonly TokenTree[], pos: number): FragmentResult;
}

export type FragmentOracle = (specifier: FragmentSpecifier) => FragmentGrammar;
