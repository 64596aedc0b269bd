/**
 * Token Model
 *
 * A token tree is either an atom (identifier, literal, punctuation) or a
 * delimited group holding an ordered sequence of token trees. Tokens are
 * immutable: every transformation builds new tokens.
 */

import { SYNTHETIC_SPAN, type Span } from "@tokenrules/core";

export type Delimiter = "paren" | "bracket" | "brace";

/** "joint" when the next token is punctuation with no whitespace in between */
export type Spacing = "joint" | "alone";

export type LiteralKind = "number" | "string";

/**
 * Identity allocated once per expansion event. Identifiers introduced by a
 * macro template carry the ids of the expansions that introduced them, so two
 * identifiers with the same spelling but different marks never resolve to the
 * same binding. Compared by reference.
 */
export class HygieneId {
  constructor(
    readonly serial: number,
    readonly macroName: string,
  ) {}

  toString(): string {
    return `${this.macroName}#${this.serial}`;
  }
}

export interface IdentToken {
  readonly kind: "ident";
  readonly text: string;
  readonly span: Span;
  /** Expansion identities, oldest first. Empty for source identifiers. */
  readonly marks: readonly HygieneId[];
}

export interface LiteralToken {
  readonly kind: "literal";
  readonly literalKind: LiteralKind;
  /** Source spelling, quotes included for strings */
  readonly text: string;
  readonly span: Span;
}

export interface PunctToken {
  readonly kind: "punct";
  readonly text: string;
  readonly spacing: Spacing;
  readonly span: Span;
}

export interface GroupToken {
  readonly kind: "group";
  readonly delimiter: Delimiter;
  readonly tokens: readonly TokenTree[];
  /** Covers the delimiters themselves */
  readonly span: Span;
}

export type TokenTree = IdentToken | LiteralToken | PunctToken | GroupToken;

export type AtomToken = Exclude<TokenTree, GroupToken>;

export const OPEN_DELIMITERS: Readonly<Record<Delimiter, string>> = {
  paren: "(",
  bracket: "[",
  brace: "{",
};

export const CLOSE_DELIMITERS: Readonly<Record<Delimiter, string>> = {
  paren: ")",
  bracket: "]",
  brace: "}",
};

export function delimiterForOpen(text: string): Delimiter | undefined {
  switch (text) {
    case "(":
      return "paren";
    case "[":
      return "bracket";
    case "{":
      return "brace";
    default:
      return undefined;
  }
}

export function delimiterForClose(text: string): Delimiter | undefined {
  switch (text) {
    case ")":
      return "paren";
    case "]":
      return "bracket";
    case "}":
      return "brace";
    default:
      return undefined;
  }
}

// ============================================================================
// Constructors
// ============================================================================

export function ident(
  text: string,
  span: Span = SYNTHETIC_SPAN,
  marks: readonly HygieneId[] = [],
): IdentToken {
  return { kind: "ident", text, span, marks };
}

export function literal(text: string, literalKind?: LiteralKind, span: Span = SYNTHETIC_SPAN): LiteralToken {
  const kind = literalKind ?? (/^["'`]/.test(text) ? "string" : "number");
  return { kind: "literal", literalKind: kind, text, span };
}

export function punct(text: string, spacing: Spacing = "alone", span: Span = SYNTHETIC_SPAN): PunctToken {
  return { kind: "punct", text, spacing, span };
}

export function group(
  delimiter: Delimiter,
  tokens: readonly TokenTree[],
  span: Span = SYNTHETIC_SPAN,
): GroupToken {
  return { kind: "group", delimiter, tokens, span };
}

// ============================================================================
// Predicates
// ============================================================================

export function isIdent(token: TokenTree | undefined, text?: string): token is IdentToken {
  return token?.kind === "ident" && (text === undefined || token.text === text);
}

export function isPunct(token: TokenTree | undefined, text?: string): token is PunctToken {
  return token?.kind === "punct" && (text === undefined || token.text === text);
}

export function isLiteral(token: TokenTree | undefined): token is LiteralToken {
  return token?.kind === "literal";
}

export function isGroup(token: TokenTree | undefined, delimiter?: Delimiter): token is GroupToken {
  return token?.kind === "group" && (delimiter === undefined || token.delimiter === delimiter);
}

// ============================================================================
// Equality
// ============================================================================

/**
 * Structural equality by kind, spelling and delimiter. Spans, spacing and
 * hygiene marks are ignored; this is the comparison literal pattern tokens use.
 */
export function tokensEqual(a: TokenTree, b: TokenTree): boolean {
  switch (a.kind) {
    case "ident":
    case "punct":
      return b.kind === a.kind && b.text === a.text;
    case "literal":
      return b.kind === "literal" && b.literalKind === a.literalKind && b.text === a.text;
    case "group":
      return b.kind === "group" && b.delimiter === a.delimiter && sequencesEqual(a.tokens, b.tokens);
  }
}

export function sequencesEqual(a: Iterable<TokenTree>, b: Iterable<TokenTree>): boolean {
  const left = [...a];
  const right = [...b];
  if (left.length !== right.length) return false;
  return left.every((token, i) => tokensEqual(token, right[i]));
}

/**
 * Resolution equality: same spelling and the same expansion marks. A
 * template-introduced identifier never resolves to a caller identifier.
 */
export function sameIdentifier(a: IdentToken, b: IdentToken): boolean {
  if (a.text !== b.text || a.marks.length !== b.marks.length) return false;
  return a.marks.every((mark, i) => mark === b.marks[i]);
}

/**
 * Depth-first walk; a group is yielded before its contents.
 */
export function* walkTokens(tokens: Iterable<TokenTree>): Generator<TokenTree> {
  const stack: Iterator<TokenTree>[] = [tokens[Symbol.iterator]()];
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    const next = top.next();
    if (next.done) {
      stack.pop();
      continue;
    }
    yield next.value;
    if (next.value.kind === "group") {
      stack.push(next.value.tokens[Symbol.iterator]());
    }
  }
}

/**
 * Short human-readable form used in diagnostics: `foo`, `,`, `(...)`.
 */
export function describeToken(token: TokenTree | undefined): string {
  if (!token) return "end of macro input";
  if (token.kind === "group") {
    return `\`${OPEN_DELIMITERS[token.delimiter]}...${CLOSE_DELIMITERS[token.delimiter]}\``;
  }
  return `\`${token.text}\``;
}
