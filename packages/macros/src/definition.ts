/**
 * Pattern-Based / Declarative Macro Definitions
 *
 * Turns `macro_rules!` source into MacroDefinition values.
 *
 * Matcher syntax:
 * - `$name:frag` captures a fragment (`expr`, `ident`, `ty`, ...)
 * - `$( ... ) sep? op` repeats, with op one of `*`, `+`, `?`
 * - delimited groups match groups of the same delimiter
 * - everything else is matched literally
 *
 * Transcriber syntax mirrors it with `$name` references and `$( ... ) sep? op`
 * echoes.
 *
 * @example
 * ```typescript
 * const registry = new MacroRegistry();
 * defineMacros(registry, `
 *   macro_rules! list {
 *     ($($x:expr),*) => { LIST[$($x),*] };
 *   }
 * `);
 *
 * defineSyntaxMacro(registry, "unless", {
 *   pattern: "$cond:expr, $body:block",
 *   expand: "if !($cond) $body",
 * });
 * ```
 */

import { joinSpans, type Span } from "@tokenrules/core";
import { isFragmentSpecifier } from "@tokenrules/fragments";
import {
  LexError,
  OPEN_DELIMITERS,
  describeToken,
  isGroup,
  isIdent,
  isPunct,
  parseTokenTrees,
  type AtomToken,
  type GroupToken,
  type ScannerOptions,
  type TokenTree,
} from "@tokenrules/tokens";
import { MacroError, invalidDefinition } from "./errors.js";
import type { MacroRegistry } from "./registry.js";
import {
  isNonEmpty,
  type MacroDefinition,
  type MacroRule,
  type PatternNode,
  type RepetitionQuantifier,
  type TemplateNode,
} from "./types.js";

// =============================================================================
// Shared syntax helpers
// =============================================================================

function quantifierOf(token: TokenTree | undefined): RepetitionQuantifier | undefined {
  if (token?.kind !== "punct") return undefined;
  switch (token.text) {
    case "*":
      return "*";
    case "+":
      return "+";
    case "?":
      return "?";
    default:
      return undefined;
  }
}

interface RepetitionTail {
  separator?: AtomToken;
  quantifier: RepetitionQuantifier;
  /** Index just past the operator */
  next: number;
  span: Span;
}

/**
 * Read `sep? op` after a `$( ... )` group at `pos`.
 */
function readRepetitionTail(macroName: string, tokens: readonly TokenTree[], pos: number, start: Span): RepetitionTail {
  const first = tokens[pos];
  const firstOp = quantifierOf(first);
  if (first && firstOp && !quantifierOf(tokens[pos + 1])) {
    return { quantifier: firstOp, next: pos + 1, span: joinSpans(start, first.span) };
  }

  const op = tokens[pos + 1];
  const quantifier = quantifierOf(op);
  if (!first || first.kind === "group" || !op || !quantifier) {
    throw new MacroError(
      invalidDefinition(
        macroName,
        `expected one of \`*\`, \`+\` or \`?\` after repetition, found ${describeToken(first)}`,
        first?.span ?? start,
      ),
    );
  }
  if (quantifier === "?") {
    throw new MacroError(
      invalidDefinition(macroName, "the `?` repetition operator does not take a separator", first.span),
    );
  }
  return { separator: first, quantifier, next: pos + 2, span: joinSpans(start, op.span) };
}

function repetitionGroup(tokens: readonly TokenTree[], pos: number): GroupToken | undefined {
  const dollar = tokens[pos];
  const body = tokens[pos + 1];
  if (isIdent(dollar, "$") && isGroup(body, "paren")) return body;
  return undefined;
}

function metavariableName(token: TokenTree | undefined): string | undefined {
  if (token?.kind === "ident" && token.text.startsWith("$") && token.text.length > 1) {
    return token.text.slice(1);
  }
  return undefined;
}

// =============================================================================
// Matchers and transcribers
// =============================================================================

/**
 * Parse the contents of a rule's matcher.
 *
 * @throws MacroError (TR1003) on malformed matcher syntax
 */
export function parsePatternNodes(macroName: string, tokens: readonly TokenTree[]): PatternNode[] {
  const nodes: PatternNode[] = [];
  let pos = 0;

  while (pos < tokens.length) {
    const token = tokens[pos];

    const repeated = repetitionGroup(tokens, pos);
    if (repeated) {
      const body = parsePatternNodes(macroName, repeated.tokens);
      if (body.length === 0) {
        throw new MacroError(invalidDefinition(macroName, "repetition matches empty token tree", repeated.span));
      }
      const tail = readRepetitionTail(macroName, tokens, pos + 2, token.span);
      nodes.push({ kind: "repetition", body, separator: tail.separator, quantifier: tail.quantifier, span: tail.span });
      pos = tail.next;
      continue;
    }

    const name = metavariableName(token);
    if (name !== undefined) {
      const specifier = tokens[pos + 2];
      if (!isPunct(tokens[pos + 1], ":") || specifier?.kind !== "ident") {
        throw new MacroError(invalidDefinition(macroName, `missing fragment specifier for \`$${name}\``, token.span));
      }
      if (!isFragmentSpecifier(specifier.text)) {
        throw new MacroError(
          invalidDefinition(macroName, `invalid fragment specifier \`${specifier.text}\``, specifier.span),
        );
      }
      nodes.push({
        kind: "metavariable",
        name,
        fragment: specifier.text,
        span: joinSpans(token.span, specifier.span),
      });
      pos += 3;
      continue;
    }

    if (token.kind === "group") {
      nodes.push({
        kind: "group",
        delimiter: token.delimiter,
        inner: parsePatternNodes(macroName, token.tokens),
        span: token.span,
      });
    } else {
      nodes.push({ kind: "literal", token });
    }
    pos++;
  }

  return nodes;
}

/**
 * Parse the contents of a rule's transcriber.
 *
 * @throws MacroError (TR1003) on malformed transcriber syntax
 */
export function parseTemplateNodes(macroName: string, tokens: readonly TokenTree[]): TemplateNode[] {
  const nodes: TemplateNode[] = [];
  let pos = 0;

  while (pos < tokens.length) {
    const token = tokens[pos];

    const repeated = repetitionGroup(tokens, pos);
    if (repeated) {
      const body = parseTemplateNodes(macroName, repeated.tokens);
      const tail = readRepetitionTail(macroName, tokens, pos + 2, token.span);
      nodes.push({
        kind: "repetition-echo",
        body,
        separator: tail.separator,
        quantifier: tail.quantifier,
        span: tail.span,
      });
      pos = tail.next;
      continue;
    }

    const name = metavariableName(token);
    if (name !== undefined) {
      nodes.push({ kind: "metavariable-ref", name, span: token.span });
    } else if (token.kind === "group") {
      nodes.push({
        kind: "group",
        delimiter: token.delimiter,
        inner: parseTemplateNodes(macroName, token.tokens),
        span: token.span,
      });
    } else {
      nodes.push({ kind: "literal", token });
    }
    pos++;
  }

  return nodes;
}

// =============================================================================
// macro_rules! bodies
// =============================================================================

/**
 * Parse the rules inside a `macro_rules!` body:
 * `(matcher) => {transcriber}` items separated by `;`, trailing `;` allowed.
 *
 * @throws MacroError (TR1003)
 */
export function parseMacroRules(name: string, body: readonly TokenTree[], span?: Span): MacroDefinition {
  const rules: MacroRule[] = [];
  let pos = 0;

  while (pos < body.length) {
    const matcher = body[pos];
    if (matcher.kind !== "group") {
      throw new MacroError(
        invalidDefinition(name, `expected a delimited matcher, found ${describeToken(matcher)}`, matcher.span),
      );
    }
    const arrow = body[pos + 1];
    if (!isPunct(arrow, "=>")) {
      throw new MacroError(
        invalidDefinition(name, `expected \`=>\` after matcher, found ${describeToken(arrow)}`, arrow?.span ?? matcher.span),
      );
    }
    const transcriber = body[pos + 2];
    if (transcriber?.kind !== "group") {
      throw new MacroError(
        invalidDefinition(
          name,
          `expected a delimited transcriber, found ${describeToken(transcriber)}`,
          transcriber?.span ?? arrow.span,
        ),
      );
    }

    rules.push({
      pattern: parsePatternNodes(name, matcher.tokens),
      template: parseTemplateNodes(name, transcriber.tokens),
      span: joinSpans(matcher.span, transcriber.span),
    });
    pos += 3;

    if (pos < body.length) {
      const separator = body[pos];
      if (!isPunct(separator, ";")) {
        throw new MacroError(
          invalidDefinition(name, `expected \`;\` between rules, found ${describeToken(separator)}`, separator.span),
        );
      }
      pos++;
    }
  }

  if (!isNonEmpty(rules)) {
    throw new MacroError(invalidDefinition(name, "macro has no rules", span));
  }
  return { name, rules, span };
}

/**
 * Parse every `macro_rules! name { ... }` item in a token stream. Paren and
 * bracket bodies must be followed by `;`.
 *
 * @throws MacroError (TR1003)
 */
export function parseMacroDefinitions(tokens: readonly TokenTree[]): MacroDefinition[] {
  const definitions: MacroDefinition[] = [];
  let pos = 0;

  while (pos < tokens.length) {
    const keyword = tokens[pos];
    if (!isIdent(keyword, "macro_rules") || !isPunct(tokens[pos + 1], "!")) {
      throw new MacroError(
        invalidDefinition(
          "macro_rules",
          `expected \`macro_rules!\`, found ${describeToken(keyword)}`,
          keyword.span,
        ),
      );
    }
    const nameToken = tokens[pos + 2];
    if (nameToken?.kind !== "ident") {
      throw new MacroError(
        invalidDefinition("macro_rules", `expected a macro name, found ${describeToken(nameToken)}`, keyword.span),
      );
    }
    const body = tokens[pos + 3];
    if (body?.kind !== "group") {
      throw new MacroError(
        invalidDefinition(nameToken.text, `expected a macro body, found ${describeToken(body)}`, nameToken.span),
      );
    }

    definitions.push(parseMacroRules(nameToken.text, body.tokens, joinSpans(keyword.span, body.span)));
    pos += 4;

    if (body.delimiter !== "brace") {
      if (!isPunct(tokens[pos], ";")) {
        throw new MacroError(
          invalidDefinition(
            nameToken.text,
            `expected \`;\` after \`${OPEN_DELIMITERS[body.delimiter]}...\` macro body, found ${describeToken(tokens[pos])}`,
            body.span,
          ),
        );
      }
      pos++;
    } else if (isPunct(tokens[pos], ";")) {
      pos++;
    }
  }

  return definitions;
}

/**
 * Lex `source` and register every `macro_rules!` item it contains.
 *
 * @returns the names defined, in source order
 * @throws LexError on malformed source
 * @throws MacroError on malformed definitions or duplicate names
 */
export function defineMacros(registry: MacroRegistry, source: string, options: ScannerOptions = {}): string[] {
  const definitions = parseMacroDefinitions(parseTokenTrees(source, options));
  for (const definition of definitions) {
    registry.define(definition.name, definition);
  }
  return definitions.map((definition) => definition.name);
}

// =============================================================================
// String API
// =============================================================================

/** Options for a single-arm syntax macro */
export interface SyntaxMacroSingleArm {
  /** Matcher contents, e.g. "$a:expr, $b:expr" */
  pattern: string;
  /** Transcriber contents, e.g. "$a + $b" */
  expand: string;
}

/** Options for a multi-arm syntax macro */
export interface SyntaxMacroMultiArm {
  /** Arms, tried in order */
  arms: SyntaxMacroSingleArm[];
}

export type SyntaxMacroOptions = SyntaxMacroSingleArm | SyntaxMacroMultiArm;

function lexArm(name: string, source: string): TokenTree[] {
  try {
    return parseTokenTrees(source);
  } catch (error) {
    if (error instanceof LexError) {
      throw new MacroError(invalidDefinition(name, error.message, error.span));
    }
    throw error;
  }
}

/**
 * Define a macro from matcher and transcriber strings.
 *
 * @throws MacroError (TR1003) when an arm fails to lex or parse, or there are no arms
 */
export function defineSyntaxMacro(
  registry: MacroRegistry,
  name: string,
  options: SyntaxMacroOptions,
): MacroDefinition {
  const arms = "arms" in options ? options.arms : [options];
  const rules = arms.map(
    (arm): MacroRule => ({
      pattern: parsePatternNodes(name, lexArm(name, arm.pattern)),
      template: parseTemplateNodes(name, lexArm(name, arm.expand)),
    }),
  );
  if (!isNonEmpty(rules)) {
    throw new MacroError(invalidDefinition(name, "macro has no rules"));
  }

  const definition: MacroDefinition = { name, rules };
  registry.define(name, definition);
  return definition;
}
