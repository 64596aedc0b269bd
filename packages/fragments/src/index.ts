/**
 * @tokenrules/fragments
 *
 * Token-level parser combinators and the grammars that decide how far a
 * `$name:fragment` capture extends.
 */

export type {
  ParseResult,
  ParseFailure,
  TokenParser,
  FragmentSpecifier,
  FragmentGrammar,
  FragmentOracle,
  FragmentResult,
} from "./types.js";
export { FRAGMENT_SPECIFIERS, isFragmentSpecifier } from "./types.js";

export {
  parser,
  ok,
  fail,
  propagate,
  TokenParseError,
  punct,
  keyword,
  identifier,
  literalToken,
  anyToken,
  group,
  eof,
  seq,
  seq3,
  alt,
  many,
  many1,
  optional,
  not,
  map,
  skip,
  sepBy,
  sepEndBy,
  between,
  lazy,
} from "./combinators.js";

export {
  KEYWORDS,
  STRUCT_LITERAL_UNSUPPORTED,
  canBeginExpr,
  canBeginType,
  canBeginPattern,
  canBeginPath,
  canBeginStatement,
  canBeginLiteral,
  parseExpression,
  parseType,
  parseTypePath,
  parsePattern,
  parseStatement,
  parseBlock,
  parseVisibility,
  parseLiteralValue,
  expression,
  ty,
  path,
  pattern,
  statement,
  block,
  visibility,
  literalValue,
} from "./grammar.js";

export { defaultFragments, defaultFragmentOracle, createFragmentOracle } from "./fragments.js";
