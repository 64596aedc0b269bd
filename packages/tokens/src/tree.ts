/**
 * Token tree construction
 *
 * Folds the flat scanner output into delimited groups with an explicit stack.
 */

import { span } from "@tokenrules/core";
import { LexError, tokenize, type LexedToken, type ScannerOptions } from "./scanner.js";
import {
  CLOSE_DELIMITERS,
  delimiterForClose,
  delimiterForOpen,
  group,
  ident,
  literal,
  punct,
  type Delimiter,
  type TokenTree,
} from "./token.js";

interface OpenGroup {
  delimiter: Delimiter;
  start: number;
  tokens: TokenTree[];
}

function isDelimiterText(text: string): boolean {
  return delimiterForOpen(text) !== undefined || delimiterForClose(text) !== undefined;
}

function toAtom(flat: LexedToken[], index: number, fileName: string | undefined): TokenTree {
  const token = flat[index];
  const tokenSpan = span(token.start, token.end, fileName);

  switch (token.kind) {
    case "ident":
      return ident(token.text, tokenSpan);
    case "number":
    case "string":
      return literal(token.text, token.kind, tokenSpan);
    case "punct": {
      const next = flat[index + 1];
      const joint =
        next !== undefined &&
        next.kind === "punct" &&
        !isDelimiterText(next.text) &&
        next.start === token.end;
      return punct(token.text, joint ? "joint" : "alone", tokenSpan);
    }
  }
}

/**
 * Build token trees from already-scanned tokens.
 *
 * @throws LexError on unbalanced delimiters
 */
export function buildTokenTrees(flat: LexedToken[], fileName?: string): TokenTree[] {
  const root: TokenTree[] = [];
  const stack: OpenGroup[] = [];

  const current = (): TokenTree[] => stack[stack.length - 1]?.tokens ?? root;

  for (let i = 0; i < flat.length; i++) {
    const token = flat[i];

    if (token.kind === "punct") {
      const open = delimiterForOpen(token.text);
      if (open) {
        stack.push({ delimiter: open, start: token.start, tokens: [] });
        continue;
      }

      const close = delimiterForClose(token.text);
      if (close) {
        const top = stack.pop();
        if (!top) {
          throw new LexError(`unexpected closing delimiter \`${token.text}\``, span(token.start, token.end, fileName));
        }
        if (top.delimiter !== close) {
          throw new LexError(
            `mismatched closing delimiter: expected \`${CLOSE_DELIMITERS[top.delimiter]}\`, found \`${token.text}\``,
            span(token.start, token.end, fileName),
          );
        }
        current().push(group(top.delimiter, top.tokens, span(top.start, token.end, fileName)));
        continue;
      }
    }

    current().push(toAtom(flat, i, fileName));
  }

  const unclosed = stack.pop();
  if (unclosed) {
    throw new LexError("unclosed delimiter", span(unclosed.start, unclosed.start + 1, fileName));
  }

  return root;
}

/**
 * Lex source text straight into token trees.
 *
 * @example
 * ```typescript
 * parseTokenTrees("vec![1, 2]");
 * // → [ident vec, punct !, group(bracket)[literal 1, punct ",", literal 2]]
 * ```
 */
export function parseTokenTrees(source: string, options: ScannerOptions = {}): TokenTree[] {
  return buildTokenTrees(tokenize(source, options), options.fileName);
}
