/**
 * Token printing
 *
 * Renders token trees back to compact source text: a single space between
 * two words (identifiers or literals), nothing anywhere else.
 */

import { CLOSE_DELIMITERS, OPEN_DELIMITERS, type TokenTree } from "./token.js";

function isWord(token: TokenTree): boolean {
  return token.kind === "ident" || token.kind === "literal";
}

export function printTokens(tokens: Iterable<TokenTree>): string {
  let out = "";
  let prev: TokenTree | undefined;

  for (const token of tokens) {
    if (prev && isWord(prev) && isWord(token)) out += " ";
    if (token.kind === "group") {
      out += OPEN_DELIMITERS[token.delimiter] + printTokens(token.tokens) + CLOSE_DELIMITERS[token.delimiter];
    } else {
      out += token.text;
    }
    prev = token;
  }

  return out;
}
