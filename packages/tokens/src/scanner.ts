/**
 * Scanner adapter
 *
 * Wraps TypeScript's scanner to produce a flat token list for the macro
 * engine's input boundary, then
 * - splits operators the host language spells as separate punctuation
 *   (`**`, `?.`, `??`, `--`, `++`),
 * - repairs numeric literals that swallowed a range dot (`0..10`) or a
 *   tuple-field dot (`t.0`),
 * - merges adjacent punctuation into multi-character operators (`::`, `->`,
 *   `..`, `..=`, `>=`) using source-position adjacency (t2.start === t1.end).
 *
 * A lifetime `'a` comes out as a `'` punct followed by the identifier `a`.
 * Single-quoted text is a character literal only when the closing quote
 * directly follows the name (`'c'`); `'ab cd'` is not a string.
 */

import ts from "typescript";
import { span, type Span } from "@tokenrules/core";

export type LexedKind = "ident" | "number" | "string" | "punct";

export interface LexedToken {
  kind: LexedKind;
  text: string;
  start: number;
  end: number;
}

export interface CustomOperatorDef {
  symbol: string;
  chars: string[];
}

/** Longest first: the first matching definition wins. */
export const DEFAULT_CUSTOM_OPERATORS: readonly CustomOperatorDef[] = [
  { symbol: "..=", chars: [".", ".", "="] },
  { symbol: "::", chars: [":", ":"] },
  { symbol: "->", chars: ["-", ">"] },
  { symbol: "..", chars: [".", "."] },
  { symbol: ">=", chars: [">", "="] },
];

const SPLIT_OPERATORS: Readonly<Record<string, readonly string[]>> = {
  "**": ["*", "*"],
  "?.": ["?", "."],
  "??": ["?", "?"],
  "--": ["-", "-"],
  "++": ["+", "+"],
};

export interface ScannerOptions {
  customOperators?: readonly CustomOperatorDef[];
  /** Recorded on every span */
  fileName?: string;
}

export class LexError extends Error {
  readonly span: Span;

  constructor(message: string, errorSpan: Span) {
    super(message);
    this.name = "LexError";
    this.span = errorSpan;
  }
}

function classify(kind: ts.SyntaxKind): LexedKind | undefined {
  if (
    kind === ts.SyntaxKind.Identifier ||
    (kind >= ts.SyntaxKind.FirstKeyword && kind <= ts.SyntaxKind.LastKeyword)
  ) {
    return "ident";
  }
  switch (kind) {
    case ts.SyntaxKind.NumericLiteral:
    case ts.SyntaxKind.BigIntLiteral:
      return "number";
    case ts.SyntaxKind.StringLiteral:
    case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
      return "string";
    default:
      break;
  }
  if (kind >= ts.SyntaxKind.FirstPunctuation && kind <= ts.SyntaxKind.LastPunctuation) {
    return "punct";
  }
  return undefined;
}

const LIFETIME = /'([A-Za-z_][A-Za-z0-9_]*)(?!['A-Za-z0-9_])/y;

/**
 * The host scanner opens a string at every `'`. A quote followed by a name
 * and no closing quote is a lifetime (`'a`, `'static`) instead.
 */
function lifetimeAt(source: string, start: number): string | undefined {
  LIFETIME.lastIndex = start;
  return LIFETIME.exec(source)?.[1];
}

function scanRaw(source: string, fileName: string | undefined): LexedToken[] {
  const scanner = ts.createScanner(ts.ScriptTarget.Latest, true, ts.LanguageVariant.Standard, source);
  const errors: LexError[] = [];
  scanner.setOnError((message) => {
    const start = scanner.getTokenStart();
    errors.push(new LexError(message.message, span(start, start + 1, fileName)));
  });

  const tokens: LexedToken[] = [];
  for (let kind = scanner.scan(); kind !== ts.SyntaxKind.EndOfFileToken; kind = scanner.scan()) {
    const start = scanner.getTokenStart();
    const text = scanner.getTokenText();
    const end = start + text.length;

    const name = kind === ts.SyntaxKind.StringLiteral && text.startsWith("'") ? lifetimeAt(source, start) : undefined;
    if (name !== undefined) {
      // Errors raised so far belong to the string scan being discarded
      errors.length = 0;
      tokens.push({ kind: "punct", text: "'", start, end: start + 1 });
      tokens.push({ kind: "ident", text: name, start: start + 1, end: start + 1 + name.length });
      scanner.resetTokenState(start + 1 + name.length);
      continue;
    }

    const firstError = errors[0];
    if (firstError) throw firstError;

    if (kind === ts.SyntaxKind.TemplateHead) {
      throw new LexError("template literal substitutions are not supported", span(start, end, fileName));
    }

    const classified = classify(kind);
    if (classified === undefined) {
      throw new LexError(`unexpected token ${JSON.stringify(text)}`, span(start, end, fileName));
    }
    tokens.push({ kind: classified, text, start, end });
  }

  const trailingError = errors[0];
  if (trailingError) throw trailingError;
  return tokens;
}

/**
 * `1..2` scans as `1.` `.2` and `t.0` as `t` `.0`; give the dots back to
 * punctuation so ranges and tuple fields survive.
 */
function repairNumericDots(tokens: LexedToken[]): LexedToken[] {
  const result: LexedToken[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const next = tokens[i + 1];

    if (token.kind === "number" && token.text.length > 1 && token.text.startsWith(".")) {
      result.push({ kind: "punct", text: ".", start: token.start, end: token.start + 1 });
      result.push({ kind: "number", text: token.text.slice(1), start: token.start + 1, end: token.end });
      continue;
    }

    if (
      token.kind === "number" &&
      token.text.length > 1 &&
      token.text.endsWith(".") &&
      next !== undefined &&
      next.start === token.end &&
      next.text.startsWith(".")
    ) {
      result.push({ kind: "number", text: token.text.slice(0, -1), start: token.start, end: token.end - 1 });
      result.push({ kind: "punct", text: ".", start: token.end - 1, end: token.end });
      continue;
    }

    result.push(token);
  }

  return result;
}

function splitOperators(tokens: LexedToken[]): LexedToken[] {
  const result: LexedToken[] = [];
  for (const token of tokens) {
    const parts = token.kind === "punct" ? SPLIT_OPERATORS[token.text] : undefined;
    if (!parts) {
      result.push(token);
      continue;
    }
    let offset = token.start;
    for (const part of parts) {
      result.push({ kind: "punct", text: part, start: offset, end: offset + part.length });
      offset += part.length;
    }
  }
  return result;
}

/**
 * Merge adjacent punctuation that forms a custom operator.
 */
function mergeCustomOperators(
  tokens: LexedToken[],
  customOperators: readonly CustomOperatorDef[],
): LexedToken[] {
  const result: LexedToken[] = [];
  let i = 0;

  while (i < tokens.length) {
    let merged = false;

    for (const op of customOperators) {
      if (i + op.chars.length > tokens.length) continue;

      let matches = true;
      for (let j = 0; j < op.chars.length; j++) {
        const token = tokens[i + j];
        if (token.kind !== "punct" || token.text !== op.chars[j]) {
          matches = false;
          break;
        }
        if (j > 0 && token.start !== tokens[i + j - 1].end) {
          matches = false;
          break;
        }
      }

      if (matches) {
        result.push({
          kind: "punct",
          text: op.symbol,
          start: tokens[i].start,
          end: tokens[i + op.chars.length - 1].end,
        });
        i += op.chars.length;
        merged = true;
        break;
      }
    }

    if (!merged) {
      result.push(tokens[i]);
      i++;
    }
  }

  return result;
}

/**
 * Tokenize source text into a flat list; delimiters stay as punctuation.
 *
 * @throws LexError on characters or literals the scanner rejects
 */
export function tokenize(source: string, options: ScannerOptions = {}): LexedToken[] {
  const customOperators = options.customOperators ?? DEFAULT_CUSTOM_OPERATORS;
  const raw = scanRaw(source, options.fileName);
  return mergeCustomOperators(splitOperators(repairNumericDots(raw)), customOperators);
}
