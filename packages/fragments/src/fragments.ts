/**
 * Fragment oracle
 *
 * Maps each fragment specifier to the grammar that recognizes it. The macro
 * matcher only ever talks to this boundary; swapping the host language means
 * supplying different grammars.
 */

import { createGenericRegistry, type GenericRegistry } from "@tokenrules/core";
import type { TokenTree } from "@tokenrules/tokens";
import {
  canBeginExpr,
  canBeginLiteral,
  canBeginPath,
  canBeginPattern,
  canBeginStatement,
  canBeginType,
  parseBlock,
  parseExpression,
  parseLiteralValue,
  parsePattern,
  parseStatement,
  parseType,
  parseTypePath,
  parseVisibility,
} from "./grammar.js";
import {
  FRAGMENT_SPECIFIERS,
  type FragmentGrammar,
  type FragmentOracle,
  type FragmentResult,
  type FragmentSpecifier,
  type ParseResult,
} from "./types.js";

type Recognize = (tokens: readonly TokenTree[], pos: number) => ParseResult<null>;

function fromRecognizer(
  canBegin: (tokens: readonly TokenTree[], pos: number) => boolean,
  recognize: Recognize,
): FragmentGrammar {
  return {
    canBegin,
    parse(tokens, pos): FragmentResult {
      const result = recognize(tokens, pos);
      return result.ok ? { ok: true, end: result.pos } : { ok: false, pos: result.pos, expected: result.expected };
    },
  };
}

/** Any identifier or keyword except `_` */
const identFragment: FragmentGrammar = {
  canBegin: (tokens, pos) => {
    const token = tokens[pos];
    return token?.kind === "ident" && token.text !== "_";
  },
  parse: (tokens, pos) => {
    const token = tokens[pos];
    if (token?.kind === "ident" && token.text !== "_") return { ok: true, end: pos + 1 };
    return { ok: false, pos, expected: "identifier" };
  },
};

/** Exactly one token tree; a group counts as one */
const tokenTreeFragment: FragmentGrammar = {
  canBegin: (tokens, pos) => pos < tokens.length,
  parse: (tokens, pos) => (pos < tokens.length ? { ok: true, end: pos + 1 } : { ok: false, pos, expected: "token tree" }),
};

const blockFragment = fromRecognizer((tokens, pos) => {
  const token = tokens[pos];
  return token?.kind === "group" && token.delimiter === "brace";
}, parseBlock);

export const defaultFragments: Readonly<Record<FragmentSpecifier, FragmentGrammar>> = {
  expr: fromRecognizer(canBeginExpr, parseExpression),
  ident: identFragment,
  literal: fromRecognizer(canBeginLiteral, parseLiteralValue),
  ty: fromRecognizer(canBeginType, parseType),
  path: fromRecognizer(canBeginPath, parseTypePath),
  pat: fromRecognizer(canBeginPattern, parsePattern),
  stmt: fromRecognizer(canBeginStatement, parseStatement),
  block: blockFragment,
  tt: tokenTreeFragment,
  // Visibility may be empty, so it can always begin.
  vis: fromRecognizer(() => true, parseVisibility),
};

/**
 * Build an oracle from the default grammars with some specifiers replaced.
 *
 * @example
 * ```typescript
 * const oracle = createFragmentOracle({ ident: upperCaseOnly });
 * oracle("ident").canBegin(tokens, 0);
 * ```
 */
export function createFragmentOracle(
  overrides: Partial<Record<FragmentSpecifier, FragmentGrammar>> = {},
): FragmentOracle {
  const registry: GenericRegistry<FragmentSpecifier, FragmentGrammar> = createGenericRegistry({
    name: "FragmentOracle",
    duplicateStrategy: "replace",
  });
  for (const specifier of FRAGMENT_SPECIFIERS) {
    registry.set(specifier, overrides[specifier] ?? defaultFragments[specifier]);
  }
  registry.seal();

  return (specifier) => registry.get(specifier) ?? defaultFragments[specifier];
}

export const defaultFragmentOracle: FragmentOracle = createFragmentOracle();
