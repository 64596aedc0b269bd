/**
 * Hygiene Context
 *
 * Each expansion event gets a fresh HygieneId. Identifiers written in a
 * macro's template are stamped with it; identifiers that arrive through
 * metavariables keep whatever marks they already carry. Two identifiers with
 * the same spelling resolve to the same binding only when their marks agree
 * (see `sameIdentifier`).
 *
 * Serials come from the context instance, so independent expanders never
 * share a counter.
 */

import { HygieneId, group, ident, type TokenTree } from "@tokenrules/tokens";

export class HygieneContext {
  private nextSerial = 0;

  newContext(macroName: string): HygieneId {
    this.nextSerial++;
    return new HygieneId(this.nextSerial, macroName);
  }

  /** Number of ids allocated so far */
  get allocated(): number {
    return this.nextSerial;
  }

  /**
   * Append `id` to an identifier's marks. Groups are rebuilt with stamped
   * contents; other tokens are returned unchanged.
   */
  stamp(token: TokenTree, id: HygieneId): TokenTree {
    return stampToken(token, id);
  }

  stampAll(tokens: readonly TokenTree[], id: HygieneId): TokenTree[] {
    return tokens.map((token) => stampToken(token, id));
  }
}

/** Stamp one token; groups are stamped deeply. */
export function stampToken(token: TokenTree, id: HygieneId): TokenTree {
  switch (token.kind) {
    case "ident":
      return ident(token.text, token.span, [...token.marks, id]);
    case "group":
      return group(
        token.delimiter,
        token.tokens.map((inner) => stampToken(inner, id)),
        token.span,
      );
    default:
      return token;
  }
}
