/**
 * Matcher
 *
 * Walks a rule's pattern and the invocation's tokens left to right. Literal
 * tokens must match exactly, metavariables delegate to the fragment oracle,
 * groups descend, and repetitions loop over their body until it stops
 * matching. There is no backtracking: a fragment consumes as much as its
 * grammar accepts, and a repetition never gives back a completed iteration.
 *
 * Failures carry a `progress` measure (flattened tokens consumed before the
 * failure point) so rule selection can report the rule that got furthest.
 */

import { DiagnosticBuilder, TR2001, TR2002, span as makeSpan, type RichDiagnostic, type Span } from "@tokenrules/core";
import { defaultFragmentOracle, type FragmentOracle, type FragmentSpecifier } from "@tokenrules/fragments";
import {
  CLOSE_DELIMITERS,
  OPEN_DELIMITERS,
  TokenSlice,
  describeToken,
  tokensEqual,
  type GroupToken,
  type TokenTree,
} from "@tokenrules/tokens";
import { Binder, collectMetavariables, type BindingEnvironment } from "./bindings.js";
import { duplicateBinding } from "./errors.js";
import type {
  MacroDefinition,
  MacroRule,
  PatternGroup,
  PatternMetavariable,
  PatternNode,
  PatternRepetition,
} from "./types.js";

export type MatchFailureKind = "mismatch" | "malformed-fragment" | "duplicate-binding";

export interface MatchFailure {
  kind: MatchFailureKind;
  /** Index into the token sequence the failure occurred in */
  index: number;
  /** Offending token; absent at the end of a sequence */
  token?: TokenTree;
  span?: Span;
  expected: string;
  actual: string;
  /** Flattened tokens consumed before the failure point */
  progress: number;
  /** Fatal failures stop rule selection */
  fatal: boolean;
  fragment?: FragmentSpecifier;
  /** Metavariable involved, for duplicate bindings */
  name?: string;
}

export type MatchResult = { ok: true; bindings: BindingEnvironment } | { ok: false; failure: MatchFailure };

export type RuleSelection =
  | { ok: true; ruleIndex: number; rule: MacroRule; bindings: BindingEnvironment }
  | { ok: false; ruleIndex: number; failure: MatchFailure };

export interface MatchOptions {
  fragments?: FragmentOracle;
  /** Where "end of macro input" failures point */
  span?: Span;
}

/** How fragment specifiers read in "expected ..." messages */
export const FRAGMENT_DESCRIPTIONS: Readonly<Record<FragmentSpecifier, string>> = {
  expr: "expression",
  ident: "identifier",
  literal: "literal",
  ty: "type",
  path: "path",
  pat: "pattern",
  stmt: "statement",
  block: "block",
  tt: "token tree",
  vis: "visibility",
};

interface MatchContext {
  readonly fragments: FragmentOracle;
  /** Progress value at index 0 of the current sequence */
  readonly base: number;
  /** Span reported when a sequence ends early */
  readonly endSpan?: Span;
  /** Furthest non-fatal failure seen so far; shared across nested sequences */
  readonly furthest: { failure?: MatchFailure };
}

type SequenceResult = { ok: true; pos: number } | { ok: false; failure: MatchFailure };

// ============================================================================
// Progress
// ============================================================================

const prefixCache = new WeakMap<readonly TokenTree[], number[]>();

function flatWidth(token: TokenTree): number {
  return token.kind === "group" ? 2 + prefixWidths(token.tokens)[token.tokens.length] : 1;
}

/** prefix[i] = flattened width of tokens[0..i) */
function prefixWidths(tokens: readonly TokenTree[]): number[] {
  const cached = prefixCache.get(tokens);
  if (cached) return cached;
  const prefix = [0];
  for (const token of tokens) prefix.push(prefix[prefix.length - 1] + flatWidth(token));
  prefixCache.set(tokens, prefix);
  return prefix;
}

function progressAt(ctx: MatchContext, input: readonly TokenTree[], pos: number): number {
  return ctx.base + prefixWidths(input)[Math.min(pos, input.length)];
}

function closingSpan(token: GroupToken): Span {
  return makeSpan(Math.max(token.span.start, token.span.end - 1), token.span.end, token.span.file);
}

// ============================================================================
// Failures
// ============================================================================

function mismatch(ctx: MatchContext, input: readonly TokenTree[], pos: number, expected: string): MatchFailure {
  const token = input[pos];
  return {
    kind: "mismatch",
    index: pos,
    token,
    span: token?.span ?? ctx.endSpan,
    expected,
    actual: describeToken(token),
    progress: progressAt(ctx, input, pos),
    fatal: false,
  };
}

/** Keep the furthest non-fatal failure; earlier failures win ties. */
function record(ctx: MatchContext, failure: MatchFailure): void {
  const current = ctx.furthest.failure;
  if (!current || failure.progress > current.progress) {
    ctx.furthest.failure = failure;
  }
}

function furthestOf(ctx: MatchContext, failure: MatchFailure): MatchFailure {
  if (failure.fatal) return failure;
  record(ctx, failure);
  return ctx.furthest.failure ?? failure;
}

// ============================================================================
// Node matchers
// ============================================================================

const repetitionNames = new WeakMap<PatternRepetition, Map<string, number>>();

function namesOf(node: PatternRepetition): Map<string, number> {
  let names = repetitionNames.get(node);
  if (!names) {
    names = collectMetavariables(node.body);
    repetitionNames.set(node, names);
  }
  return names;
}

function matchMetavariable(
  node: PatternMetavariable,
  input: readonly TokenTree[],
  pos: number,
  binder: Binder,
  ctx: MatchContext,
): SequenceResult {
  const grammar = ctx.fragments(node.fragment);
  if (!grammar.canBegin(input, pos)) {
    return { ok: false, failure: mismatch(ctx, input, pos, FRAGMENT_DESCRIPTIONS[node.fragment]) };
  }

  const parsed = grammar.parse(input, pos);
  if (!parsed.ok) {
    const token = input[parsed.pos];
    return {
      ok: false,
      failure: {
        kind: "malformed-fragment",
        index: parsed.pos,
        token,
        span: token?.span ?? ctx.endSpan,
        expected: parsed.expected,
        actual: describeToken(token),
        progress: progressAt(ctx, input, parsed.pos),
        fatal: true,
        fragment: node.fragment,
      },
    };
  }

  const tokens = new TokenSlice(input, pos, parsed.end);
  if (!binder.bind(node.name, { kind: "single", fragment: node.fragment, tokens, span: tokens.span })) {
    return { ok: false, failure: duplicateFailure(ctx, input, pos, node.name, node.span) };
  }
  return { ok: true, pos: parsed.end };
}

function duplicateFailure(
  ctx: MatchContext,
  input: readonly TokenTree[],
  pos: number,
  name: string,
  span: Span,
): MatchFailure {
  return {
    kind: "duplicate-binding",
    index: pos,
    token: input[pos],
    span,
    expected: `a single binding of \`$${name}\``,
    actual: `a second binding of \`$${name}\``,
    progress: progressAt(ctx, input, pos),
    fatal: true,
    name,
  };
}

function matchRepetition(
  node: PatternRepetition,
  input: readonly TokenTree[],
  pos: number,
  binder: Binder,
  ctx: MatchContext,
): SequenceResult {
  const iterations: Binder[] = [];
  let cur = pos;
  let firstFailure: MatchFailure | undefined;

  for (;;) {
    if (node.quantifier === "?" && iterations.length === 1) break;

    let start = cur;
    if (iterations.length > 0 && node.separator) {
      const token = input[cur];
      if (!token || !tokensEqual(token, node.separator)) {
        record(ctx, mismatch(ctx, input, cur, describeToken(node.separator)));
        break;
      }
      start = cur + 1;
    }

    const iteration = binder.child();
    const result = matchSequence(node.body, input, start, iteration, ctx);
    if (!result.ok) {
      if (result.failure.fatal) return result;
      record(ctx, result.failure);
      firstFailure ??= result.failure;
      break;
    }
    // An iteration that consumes nothing would repeat forever.
    if (result.pos === start) break;

    iterations.push(iteration);
    cur = result.pos;
  }

  if (node.quantifier === "+" && iterations.length === 0) {
    return { ok: false, failure: firstFailure ?? mismatch(ctx, input, pos, "at least one repetition") };
  }

  const duplicate = binder.bindRepetition(namesOf(node), iterations);
  if (duplicate !== undefined) {
    return { ok: false, failure: duplicateFailure(ctx, input, pos, duplicate, node.span) };
  }
  return { ok: true, pos: cur };
}

function matchGroup(
  node: PatternGroup,
  input: readonly TokenTree[],
  pos: number,
  binder: Binder,
  ctx: MatchContext,
): SequenceResult {
  const token = input[pos];
  if (token?.kind !== "group" || token.delimiter !== node.delimiter) {
    return { ok: false, failure: mismatch(ctx, input, pos, `\`${OPEN_DELIMITERS[node.delimiter]}\``) };
  }

  const inner: MatchContext = {
    ...ctx,
    base: progressAt(ctx, input, pos) + 1,
    endSpan: closingSpan(token),
  };
  const result = matchSequence(node.inner, token.tokens, 0, binder, inner);
  if (!result.ok) return result;
  if (result.pos !== token.tokens.length) {
    return {
      ok: false,
      failure: mismatch(inner, token.tokens, result.pos, `\`${CLOSE_DELIMITERS[node.delimiter]}\``),
    };
  }
  return { ok: true, pos: pos + 1 };
}

function matchSequence(
  nodes: readonly PatternNode[],
  input: readonly TokenTree[],
  pos: number,
  binder: Binder,
  ctx: MatchContext,
): SequenceResult {
  let cur = pos;
  for (const node of nodes) {
    let result: SequenceResult;
    switch (node.kind) {
      case "literal": {
        const token = input[cur];
        result =
          token && tokensEqual(token, node.token)
            ? { ok: true, pos: cur + 1 }
            : { ok: false, failure: mismatch(ctx, input, cur, describeToken(node.token)) };
        break;
      }
      case "metavariable":
        result = matchMetavariable(node, input, cur, binder, ctx);
        break;
      case "repetition":
        result = matchRepetition(node, input, cur, binder, ctx);
        break;
      case "group":
        result = matchGroup(node, input, cur, binder, ctx);
        break;
    }
    if (!result.ok) return result;
    cur = result.pos;
  }
  return { ok: true, pos: cur };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Match a whole invocation against one pattern. The pattern must consume
 * every token of `input`.
 */
export function matchPattern(
  pattern: readonly PatternNode[],
  input: readonly TokenTree[],
  options: MatchOptions = {},
): MatchResult {
  const ctx: MatchContext = {
    fragments: options.fragments ?? defaultFragmentOracle,
    base: 0,
    endSpan: options.span,
    furthest: {},
  };
  const binder = new Binder();

  const result = matchSequence(pattern, input, 0, binder, ctx);
  if (!result.ok) return { ok: false, failure: furthestOf(ctx, result.failure) };
  if (result.pos !== input.length) {
    return { ok: false, failure: furthestOf(ctx, mismatch(ctx, input, result.pos, "end of macro input")) };
  }
  return { ok: true, bindings: binder.environment() };
}

/**
 * Try each rule in declaration order. A fatal failure ends the search at
 * once; otherwise the failure of the rule that progressed furthest is
 * returned, the earliest rule winning ties.
 */
export function selectRule(
  definition: MacroDefinition,
  input: readonly TokenTree[],
  options: MatchOptions = {},
): RuleSelection {
  const failures: Extract<RuleSelection, { ok: false }>[] = [];

  for (const [ruleIndex, rule] of definition.rules.entries()) {
    const result = matchPattern(rule.pattern, input, options);
    if (result.ok) return { ok: true, ruleIndex, rule, bindings: result.bindings };
    if (result.failure.fatal) return { ok: false, ruleIndex, failure: result.failure };
    failures.push({ ok: false, ruleIndex, failure: result.failure });
  }

  return failures.reduce((best, next) => (next.failure.progress > best.failure.progress ? next : best));
}

/** Turn a match failure into the diagnostic reported for an invocation. */
export function matchFailureDiagnostic(macroName: string, failure: MatchFailure, invocationSpan?: Span): RichDiagnostic {
  const at = failure.span ?? invocationSpan;
  switch (failure.kind) {
    case "mismatch":
      return new DiagnosticBuilder(TR2001)
        .at(at)
        .withArgs({ macro: macroName, expected: failure.expected, actual: failure.actual })
        .build();
    case "malformed-fragment":
      return new DiagnosticBuilder(TR2002)
        .at(at)
        .withArgs({
          fragment: failure.fragment,
          macro: macroName,
          expected: failure.expected,
          actual: failure.actual,
        })
        .build();
    case "duplicate-binding":
      return duplicateBinding(macroName, failure.name ?? "", at);
  }
}
