/**
 * @tokenrules/tokens
 *
 * The token model shared by every stage of macro expansion:
 * - Token trees (identifiers, literals, punctuation, delimited groups)
 * - Hygiene marks on identifiers
 * - Token slices used for captures
 * - A lexer adapter over the TypeScript scanner
 * - A compact printer
 */

export * from "./token.js";
export { TokenSlice } from "./slice.js";
export {
  tokenize,
  LexError,
  DEFAULT_CUSTOM_OPERATORS,
  type LexedToken,
  type LexedKind,
  type CustomOperatorDef,
  type ScannerOptions,
} from "./scanner.js";
export { buildTokenTrees, parseTokenTrees } from "./tree.js";
export { printTokens } from "./print.js";
