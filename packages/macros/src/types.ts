/**
 * Core types for @tokenrules/macros
 *
 * A macro definition is an ordered list of rules. Each rule pairs a matcher
 * pattern with a transcriber template; both are trees of nodes mirroring the
 * token trees they describe.
 */

import type { RichDiagnostic, Span } from "@tokenrules/core";
import type { FragmentSpecifier } from "@tokenrules/fragments";
import type { AtomToken, Delimiter, TokenTree } from "@tokenrules/tokens";

export type RepetitionQuantifier = "*" | "+" | "?";

// =============================================================================
// Patterns
// =============================================================================

export interface PatternLiteral {
  kind: "literal";
  token: AtomToken;
}

/** `$name:fragment` */
export interface PatternMetavariable {
  kind: "metavariable";
  name: string;
  fragment: FragmentSpecifier;
  span: Span;
}

/** `$( body ) separator? quantifier` */
export interface PatternRepetition {
  kind: "repetition";
  body: readonly PatternNode[];
  separator?: AtomToken;
  quantifier: RepetitionQuantifier;
  span: Span;
}

export interface PatternGroup {
  kind: "group";
  delimiter: Delimiter;
  inner: readonly PatternNode[];
  span: Span;
}

export type PatternNode = PatternLiteral | PatternMetavariable | PatternRepetition | PatternGroup;

// =============================================================================
// Templates
// =============================================================================

export interface TemplateLiteral {
  kind: "literal";
  token: AtomToken;
}

/** `$name` */
export interface TemplateMetavariableRef {
  kind: "metavariable-ref";
  name: string;
  span: Span;
}

export interface TemplateRepetitionEcho {
  kind: "repetition-echo";
  body: readonly TemplateNode[];
  separator?: AtomToken;
  quantifier: RepetitionQuantifier;
  span: Span;
}

export interface TemplateGroup {
  kind: "group";
  delimiter: Delimiter;
  inner: readonly TemplateNode[];
  span: Span;
}

export type TemplateNode = TemplateLiteral | TemplateMetavariableRef | TemplateRepetitionEcho | TemplateGroup;

// =============================================================================
// Definitions
// =============================================================================

export interface MacroRule {
  pattern: readonly PatternNode[];
  template: readonly TemplateNode[];
  span?: Span;
}

/** Rules are tried top to bottom; the first full match wins. */
export interface MacroDefinition {
  name: string;
  rules: readonly [MacroRule, ...MacroRule[]];
  span?: Span;
}

export function isNonEmpty<T>(items: readonly T[]): items is readonly [T, ...T[]] {
  return items.length > 0;
}

// =============================================================================
// Expansion
// =============================================================================

export interface MacroInvocation {
  name: string;
  /** Contents of the invocation's delimited group */
  args: readonly TokenTree[];
  span?: Span;
}

export interface ExpansionFrame {
  readonly macroName: string;
  readonly span: Span;
  /** Index of the rule that matched; null while the rule is still being selected */
  readonly ruleIndex: number | null;
}

export type ExpansionResult =
  | { ok: true; tokens: TokenTree[] }
  | { ok: false; diagnostic: RichDiagnostic; chain: readonly ExpansionFrame[] };
