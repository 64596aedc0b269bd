/**
 * Host fragment grammars
 *
 * Recognizers for a small expression-oriented host language: expressions,
 * types, paths, patterns, statements and blocks. They report only where a
 * fragment ends; no syntax tree is built. Every recognizer consumes
 * maximally and never backtracks once a fragment has begun.
 *
 * Expressions use precedence climbing, lowest binding first:
 *
 *   assignment (right)  =  +=  -=  *=  /=  %=  &=  |=  ^=  <<=  >>=
 *   range               ..  ..=
 *   ||
 *   &&
 *   comparison          ==  !=  <  >  <=  >=
 *   |
 *   ^
 *   &
 *   shift               <<  >>
 *   additive            +  -
 *   multiplicative      *  /  %
 *   cast                as
 *   unary               -  !  *  &  &mut
 *   postfix             calls, indexing, fields, methods, ?
 *
 * Struct literal expressions (`Path { ... }`) are not part of the language.
 */

import type { Delimiter, TokenTree } from "@tokenrules/tokens";
import {
  fail,
  group,
  ok,
  optional,
  parser,
  punct,
  sepEndBy,
  seq,
  skip,
} from "./combinators.js";
import type { ParseResult, TokenParser } from "./types.js";

type Tokens = readonly TokenTree[];
type Step = ParseResult<null>;

export const KEYWORDS: ReadonlySet<string> = new Set([
  "_",
  "as",
  "break",
  "const",
  "continue",
  "crate",
  "dyn",
  "else",
  "enum",
  "false",
  "fn",
  "for",
  "if",
  "impl",
  "in",
  "let",
  "loop",
  "match",
  "mod",
  "move",
  "mut",
  "pub",
  "ref",
  "return",
  "self",
  "Self",
  "static",
  "struct",
  "super",
  "trait",
  "true",
  "type",
  "unsafe",
  "use",
  "where",
  "while",
]);

/** Keywords that may still open a path */
const PATH_KEYWORDS: ReadonlySet<string> = new Set(["self", "Self", "super", "crate"]);

const EXPR_KEYWORDS: ReadonlySet<string> = new Set([
  "if",
  "while",
  "loop",
  "for",
  "match",
  "return",
  "break",
  "continue",
  "true",
  "false",
  "move",
  "unsafe",
]);

const EXPR_PREFIX_PUNCT: ReadonlySet<string> = new Set(["-", "!", "*", "&", "&&", "|", "||", "..", "..=", "::"]);

const ASSIGN_OPS: ReadonlySet<string> = new Set(["=", "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "<<="]);

const BINARY_PRECEDENCE: Readonly<Record<string, number>> = {
  "||": 1,
  "&&": 2,
  "==": 3,
  "!=": 3,
  "<": 3,
  ">": 3,
  "<=": 3,
  ">=": 3,
  "|": 4,
  "^": 5,
  "&": 6,
  "<<": 7,
  "+": 8,
  "-": 8,
  "*": 9,
  "/": 9,
  "%": 9,
};

const SHIFT_PRECEDENCE = 7;

export const STRUCT_LITERAL_UNSUPPORTED = "expression (struct literal syntax is not supported)";

interface ExprContext {
  /** Set in `if`/`while`/`match`/`for` heads, where a brace group ends the expression */
  readonly noStruct: boolean;
}

const STRUCT_OK: ExprContext = { noStruct: false };
const NO_STRUCT: ExprContext = { noStruct: true };

// ---------------------------------------------------------------------------
// Token helpers
// ---------------------------------------------------------------------------

function isPunctAt(input: Tokens, pos: number, text: string): boolean {
  const token = input[pos];
  return token?.kind === "punct" && token.text === text;
}

function isIdentAt(input: Tokens, pos: number, text: string): boolean {
  const token = input[pos];
  return token?.kind === "ident" && token.text === text;
}

function isGroupAt(input: Tokens, pos: number, delimiter: Delimiter): boolean {
  const token = input[pos];
  return token?.kind === "group" && token.delimiter === delimiter;
}

function isPathStart(token: TokenTree | undefined): boolean {
  return token?.kind === "ident" && (!KEYWORDS.has(token.text) || PATH_KEYWORDS.has(token.text));
}

// ---------------------------------------------------------------------------
// Lookahead
// ---------------------------------------------------------------------------

export function canBeginExpr(input: Tokens, pos: number): boolean {
  const token = input[pos];
  if (!token) return false;
  switch (token.kind) {
    case "literal":
    case "group":
      return true;
    case "punct":
      return EXPR_PREFIX_PUNCT.has(token.text);
    case "ident":
      return EXPR_KEYWORDS.has(token.text) || isPathStart(token);
  }
}

export function canBeginType(input: Tokens, pos: number): boolean {
  const token = input[pos];
  if (!token) return false;
  switch (token.kind) {
    case "literal":
      return false;
    case "group":
      return token.delimiter !== "brace";
    case "punct":
      return ["&", "&&", "*", "!", "::"].includes(token.text);
    case "ident":
      return ["_", "fn", "impl", "dyn"].includes(token.text) || isPathStart(token);
  }
}

export function canBeginPattern(input: Tokens, pos: number): boolean {
  const token = input[pos];
  if (!token) return false;
  switch (token.kind) {
    case "literal":
      return true;
    case "group":
      return token.delimiter !== "brace";
    case "punct":
      return ["&", "&&", "-", "..", "::", "|"].includes(token.text);
    case "ident":
      return ["_", "true", "false", "ref", "mut"].includes(token.text) || isPathStart(token);
  }
}

export function canBeginPath(input: Tokens, pos: number): boolean {
  return isPunctAt(input, pos, "::") || isPathStart(input[pos]);
}

export function canBeginStatement(input: Tokens, pos: number): boolean {
  return isIdentAt(input, pos, "let") || isIdentAt(input, pos, "fn") || isIdentAt(input, pos, "pub") || canBeginExpr(input, pos);
}

export function canBeginLiteral(input: Tokens, pos: number): boolean {
  const token = input[pos];
  if (!token) return false;
  if (token.kind === "literal") return true;
  if (token.kind === "ident") return token.text === "true" || token.text === "false";
  return token.kind === "punct" && token.text === "-" && input[pos + 1]?.kind === "literal";
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

function parsePathSegment(input: Tokens, pos: number): Step {
  return isPathStart(input[pos]) ? ok(null, pos + 1) : fail(pos, "path segment");
}

function parseGenericArgs(input: Tokens, pos: number): Step {
  if (!isPunctAt(input, pos, "<")) return fail(pos, "`<`");
  let cur = pos + 1;
  while (!isPunctAt(input, cur, ">")) {
    const arg = parseType(input, cur);
    if (!arg.ok) return arg;
    cur = arg.pos;
    if (isPunctAt(input, cur, ",")) {
      cur++;
    } else if (!isPunctAt(input, cur, ">")) {
      return fail(cur, "`,` or `>`");
    }
  }
  return ok(null, cur + 1);
}

/**
 * `style` decides how generic arguments are written: directly after a
 * segment in type position (`Vec<T>`), and only behind `::` in expressions
 * (`Vec::<T>::new`), where a bare `<` is a comparison. Both styles take the
 * `::<T>` form.
 */
function parsePath(input: Tokens, pos: number, style: "type" | "expr"): Step {
  let cur = pos;
  if (isPunctAt(input, cur, "::")) cur++;
  const first = parsePathSegment(input, cur);
  if (!first.ok) return first;
  cur = first.pos;

  for (;;) {
    if (style === "type" && isPunctAt(input, cur, "<")) {
      const args = parseGenericArgs(input, cur);
      if (!args.ok) return args;
      cur = args.pos;
    }
    if (!isPunctAt(input, cur, "::")) break;
    if (isPunctAt(input, cur + 1, "<")) {
      const args = parseGenericArgs(input, cur + 1);
      if (!args.ok) return args;
      cur = args.pos;
      continue;
    }
    const segment = parsePathSegment(input, cur + 1);
    if (!segment.ok) return segment;
    cur = segment.pos;
  }

  return ok(null, cur);
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const typeList: TokenParser<null> = skip(sepEndBy(parser(parseType), punct(",")));

const arrayType: TokenParser<null> = skip(
  seq(parser(parseType), optional(seq(punct(";"), parser((input, pos) => parseExpr(input, pos, STRUCT_OK))))),
);

function parseBounds(input: Tokens, pos: number): Step {
  let result = parsePath(input, pos, "type");
  while (result.ok && isPunctAt(input, result.pos, "+")) {
    result = parsePath(input, result.pos + 1, "type");
  }
  return result;
}

function parseFnType(input: Tokens, pos: number): Step {
  const params = group("paren", typeList).parse(input, pos);
  if (!params.ok) return params;
  if (isPunctAt(input, params.pos, "->")) return parseType(input, params.pos + 1);
  return params;
}

export function parseType(input: Tokens, pos: number): Step {
  const token = input[pos];
  if (!token) return fail(pos, "type");

  switch (token.kind) {
    case "group":
      if (token.delimiter === "paren") return group("paren", typeList).parse(input, pos);
      if (token.delimiter === "bracket") return group("bracket", arrayType).parse(input, pos);
      return fail(pos, "type");
    case "punct":
      switch (token.text) {
        case "&":
        case "&&":
          return parseType(input, isIdentAt(input, pos + 1, "mut") ? pos + 2 : pos + 1);
        case "*":
          if (isIdentAt(input, pos + 1, "const") || isIdentAt(input, pos + 1, "mut")) {
            return parseType(input, pos + 2);
          }
          return fail(pos + 1, "`const` or `mut`");
        case "!":
          return ok(null, pos + 1);
        case "::":
          return parsePath(input, pos, "type");
        default:
          return fail(pos, "type");
      }
    case "ident":
      switch (token.text) {
        case "_":
          return ok(null, pos + 1);
        case "fn":
          return parseFnType(input, pos + 1);
        case "impl":
        case "dyn":
          return parseBounds(input, pos + 1);
        default:
          return isPathStart(token) ? parsePath(input, pos, "type") : fail(pos, "type");
      }
    case "literal":
      return fail(pos, "type");
  }
}

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

const patternList: TokenParser<null> = skip(sepEndBy(parser(parsePattern), punct(",")));

function parseFieldPattern(input: Tokens, pos: number): Step {
  if (isPunctAt(input, pos, "..")) return ok(null, pos + 1);
  let cur = pos;
  if (isIdentAt(input, cur, "ref")) cur++;
  if (isIdentAt(input, cur, "mut")) cur++;
  const token = input[cur];
  if (token?.kind !== "ident" || KEYWORDS.has(token.text)) return fail(cur, "field name");
  cur++;
  if (cur === pos + 1 && isPunctAt(input, cur, ":")) return parsePattern(input, cur + 1);
  return ok(null, cur);
}

const fieldPatternList: TokenParser<null> = skip(sepEndBy(parser(parseFieldPattern), punct(",")));

export function parseLiteralValue(input: Tokens, pos: number): Step {
  const start = isPunctAt(input, pos, "-") ? pos + 1 : pos;
  const token = input[start];
  if (token?.kind === "literal") return ok(null, start + 1);
  if (start === pos && (isIdentAt(input, pos, "true") || isIdentAt(input, pos, "false"))) {
    return ok(null, pos + 1);
  }
  return fail(start, "literal");
}

function parseRangePatternTail(input: Tokens, pos: number): Step {
  if (isPunctAt(input, pos, "..=") || isPunctAt(input, pos, "..")) {
    const end = parseLiteralValue(input, pos + 1);
    if (end.ok) return end;
    if (isPunctAt(input, pos, "..")) return ok(null, pos + 1);
    return end;
  }
  return ok(null, pos);
}

function parseBindingPattern(input: Tokens, pos: number): Step {
  let cur = pos;
  if (isIdentAt(input, cur, "ref")) cur++;
  if (isIdentAt(input, cur, "mut")) cur++;
  const token = input[cur];
  if (token?.kind !== "ident" || KEYWORDS.has(token.text)) return fail(cur, "identifier");
  cur++;
  if (isPunctAt(input, cur, "@")) return parsePatternNoAlt(input, cur + 1);
  return ok(null, cur);
}

function parsePatternNoAlt(input: Tokens, pos: number): Step {
  const token = input[pos];
  if (!token) return fail(pos, "pattern");

  switch (token.kind) {
    case "literal":
      return parseRangePatternTail(input, pos + 1);
    case "group":
      if (token.delimiter === "paren") return group("paren", patternList).parse(input, pos);
      if (token.delimiter === "bracket") return group("bracket", patternList).parse(input, pos);
      return fail(pos, "pattern");
    case "punct":
      switch (token.text) {
        case "&":
        case "&&":
          return parsePatternNoAlt(input, isIdentAt(input, pos + 1, "mut") ? pos + 2 : pos + 1);
        case "-": {
          const lit = parseLiteralValue(input, pos);
          return lit.ok ? parseRangePatternTail(input, lit.pos) : lit;
        }
        case "..":
          return ok(null, pos + 1);
        case "::":
          break;
        default:
          return fail(pos, "pattern");
      }
      break;
    case "ident":
      switch (token.text) {
        case "_":
          return ok(null, pos + 1);
        case "true":
        case "false":
          return ok(null, pos + 1);
        case "ref":
        case "mut":
          return parseBindingPattern(input, pos);
        default:
          if (!isPathStart(token)) return fail(pos, "pattern");
      }
      break;
  }

  const path = parsePath(input, pos, "expr");
  if (!path.ok) return path;
  if (isGroupAt(input, path.pos, "paren")) return group("paren", patternList).parse(input, path.pos);
  if (isGroupAt(input, path.pos, "brace")) return group("brace", fieldPatternList).parse(input, path.pos);
  if (path.pos === pos + 1 && isPunctAt(input, path.pos, "@")) return parsePatternNoAlt(input, path.pos + 1);
  return parseRangePatternTail(input, path.pos);
}

/** Top-level patterns may be `|`-separated alternatives, with an optional leading `|`. */
export function parsePattern(input: Tokens, pos: number): Step {
  const start = isPunctAt(input, pos, "|") ? pos + 1 : pos;
  let result = parsePatternNoAlt(input, start);
  while (result.ok && isPunctAt(input, result.pos, "|")) {
    result = parsePatternNoAlt(input, result.pos + 1);
  }
  return result;
}

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

const exprList: TokenParser<null> = skip(
  sepEndBy(
    parser((input, pos) => parseExpr(input, pos, STRUCT_OK)),
    punct(","),
  ),
);

const indexArg: TokenParser<null> = parser((input, pos) => parseExpr(input, pos, STRUCT_OK));

function parseArrayContents(input: Tokens, pos: number): Step {
  if (pos >= input.length) return ok(null, pos);
  const first = parseExpr(input, pos, STRUCT_OK);
  if (!first.ok) return first;
  if (isPunctAt(input, first.pos, ";")) return parseExpr(input, first.pos + 1, STRUCT_OK);
  if (isPunctAt(input, first.pos, ",")) return exprList.parse(input, first.pos + 1);
  return first;
}

const arrayContents: TokenParser<null> = parser(parseArrayContents);

const closureParam: TokenParser<null> = skip(
  seq(parser(parsePatternNoAlt), optional(seq(punct(":"), parser(parseType)))),
);

const closureParams: TokenParser<null> = skip(sepEndBy(closureParam, punct(",")));

function parseCondition(input: Tokens, pos: number): Step {
  if (isIdentAt(input, pos, "let")) {
    const pattern = parsePattern(input, pos + 1);
    if (!pattern.ok) return pattern;
    if (!isPunctAt(input, pattern.pos, "=")) return fail(pattern.pos, "`=`");
    return parseExpr(input, pattern.pos + 1, NO_STRUCT);
  }
  return parseExpr(input, pos, NO_STRUCT);
}

function parseIf(input: Tokens, pos: number): Step {
  const condition = parseCondition(input, pos + 1);
  if (!condition.ok) return condition;
  const body = parseBlock(input, condition.pos);
  if (!body.ok) return body;
  if (!isIdentAt(input, body.pos, "else")) return body;
  if (isIdentAt(input, body.pos + 1, "if")) return parseIf(input, body.pos + 1);
  return parseBlock(input, body.pos + 1);
}

function parseWhile(input: Tokens, pos: number): Step {
  const condition = parseCondition(input, pos + 1);
  if (!condition.ok) return condition;
  return parseBlock(input, condition.pos);
}

function parseFor(input: Tokens, pos: number): Step {
  const pattern = parsePattern(input, pos + 1);
  if (!pattern.ok) return pattern;
  if (!isIdentAt(input, pattern.pos, "in")) return fail(pattern.pos, "`in`");
  const iterable = parseExpr(input, pattern.pos + 1, NO_STRUCT);
  if (!iterable.ok) return iterable;
  return parseBlock(input, iterable.pos);
}

function parseMatchArms(input: Tokens, pos: number): Step {
  let cur = pos;
  while (cur < input.length) {
    const pattern = parsePattern(input, cur);
    if (!pattern.ok) return pattern;
    cur = pattern.pos;
    if (isIdentAt(input, cur, "if")) {
      const guard = parseExpr(input, cur + 1, STRUCT_OK);
      if (!guard.ok) return guard;
      cur = guard.pos;
    }
    if (!isPunctAt(input, cur, "=>")) return fail(cur, "`=>`");
    const body = parseExpr(input, cur + 1, STRUCT_OK);
    if (!body.ok) return body;
    cur = body.pos;
    if (isPunctAt(input, cur, ",")) {
      cur++;
    } else if (cur < input.length && !isGroupAt(input, cur - 1, "brace")) {
      return fail(cur, "`,` or `}`");
    }
  }
  return ok(null, cur);
}

const matchArms: TokenParser<null> = parser(parseMatchArms);

function parseMatch(input: Tokens, pos: number): Step {
  const scrutinee = parseExpr(input, pos + 1, NO_STRUCT);
  if (!scrutinee.ok) return scrutinee;
  return group("brace", matchArms).parse(input, scrutinee.pos);
}

function parseClosure(input: Tokens, pos: number, ctx: ExprContext): Step {
  let cur: number;
  if (isPunctAt(input, pos, "||")) {
    cur = pos + 1;
  } else {
    const params = closureParams.parse(input, pos + 1);
    if (!params.ok) return params;
    if (!isPunctAt(input, params.pos, "|")) return fail(params.pos, "`|`");
    cur = params.pos + 1;
  }
  if (isPunctAt(input, cur, "->")) {
    const returnType = parseType(input, cur + 1);
    if (!returnType.ok) return returnType;
    return parseBlock(input, returnType.pos);
  }
  return parseExpr(input, cur, ctx);
}

function parsePathExpr(input: Tokens, pos: number, ctx: ExprContext): Step {
  const path = parsePath(input, pos, "expr");
  if (!path.ok) return path;
  if (isPunctAt(input, path.pos, "!") && input[path.pos + 1]?.kind === "group") {
    return ok(null, path.pos + 2);
  }
  if (!ctx.noStruct && isGroupAt(input, path.pos, "brace")) {
    return fail(pos, STRUCT_LITERAL_UNSUPPORTED);
  }
  return path;
}

function parseOptionalOperand(input: Tokens, pos: number, ctx: ExprContext): Step {
  return canBeginExpr(input, pos) ? parseExpr(input, pos, ctx) : ok(null, pos);
}

function parseDelimitedExpr(input: Tokens, pos: number, delimiter: Delimiter): Step {
  switch (delimiter) {
    case "paren":
      return group("paren", exprList).parse(input, pos);
    case "bracket":
      return group("bracket", arrayContents).parse(input, pos);
    case "brace":
      return parseBlock(input, pos);
  }
}

function parsePrimary(input: Tokens, pos: number, ctx: ExprContext): Step {
  const token = input[pos];
  if (!token) return fail(pos, "expression");

  switch (token.kind) {
    case "literal":
      return ok(null, pos + 1);
    case "group":
      return parseDelimitedExpr(input, pos, token.delimiter);
    case "punct":
      if (token.text === "|" || token.text === "||") return parseClosure(input, pos, ctx);
      if (token.text === "::") return parsePathExpr(input, pos, ctx);
      return fail(pos, "expression");
    case "ident":
      switch (token.text) {
        case "true":
        case "false":
        case "continue":
          return ok(null, pos + 1);
        case "if":
          return parseIf(input, pos);
        case "while":
          return parseWhile(input, pos);
        case "loop":
        case "unsafe":
          return parseBlock(input, pos + 1);
        case "for":
          return parseFor(input, pos);
        case "match":
          return parseMatch(input, pos);
        case "return":
        case "break":
          return parseOptionalOperand(input, pos + 1, ctx);
        case "move":
          if (isPunctAt(input, pos + 1, "|") || isPunctAt(input, pos + 1, "||")) {
            return parseClosure(input, pos + 1, ctx);
          }
          return fail(pos + 1, "closure");
        default:
          return isPathStart(token) ? parsePathExpr(input, pos, ctx) : fail(pos, "expression");
      }
  }
}

function parsePostfix(input: Tokens, pos: number, ctx: ExprContext): Step {
  const primary = parsePrimary(input, pos, ctx);
  if (!primary.ok) return primary;
  let cur = primary.pos;

  for (;;) {
    if (isGroupAt(input, cur, "paren")) {
      const call = group("paren", exprList).parse(input, cur);
      if (!call.ok) return call;
      cur = call.pos;
    } else if (isGroupAt(input, cur, "bracket")) {
      const index = group("bracket", indexArg).parse(input, cur);
      if (!index.ok) return index;
      cur = index.pos;
    } else if (isPunctAt(input, cur, "?")) {
      cur++;
    } else if (isPunctAt(input, cur, ".")) {
      const member = input[cur + 1];
      if (member?.kind === "literal" && member.literalKind === "number") {
        cur += 2;
      } else if (member?.kind === "ident") {
        cur += 2;
        if (isPunctAt(input, cur, "::")) {
          const args = parseGenericArgs(input, cur + 1);
          if (!args.ok) return args;
          cur = args.pos;
        }
      } else {
        return fail(cur + 1, "field name or method call");
      }
    } else {
      return ok(null, cur);
    }
  }
}

function parseUnary(input: Tokens, pos: number, ctx: ExprContext): Step {
  const token = input[pos];
  if (token?.kind === "punct") {
    switch (token.text) {
      case "-":
      case "!":
      case "*":
        return parseUnary(input, pos + 1, ctx);
      case "&":
      case "&&":
        return parseUnary(input, isIdentAt(input, pos + 1, "mut") ? pos + 2 : pos + 1, ctx);
      default:
        break;
    }
  }
  return parsePostfix(input, pos, ctx);
}

function parseCast(input: Tokens, pos: number, ctx: ExprContext): Step {
  let result = parseUnary(input, pos, ctx);
  while (result.ok && isIdentAt(input, result.pos, "as")) {
    result = parseType(input, result.pos + 1);
  }
  return result;
}

/** `>>` arrives as two joint `>` tokens; `>>=` as `>` followed by `>=`. */
function binaryOperator(input: Tokens, pos: number): { precedence: number; width: number } | undefined {
  const token = input[pos];
  if (token?.kind !== "punct") return undefined;
  if (token.text === ">" && token.spacing === "joint") {
    if (isPunctAt(input, pos + 1, ">")) return { precedence: SHIFT_PRECEDENCE, width: 2 };
    if (isPunctAt(input, pos + 1, ">=")) return undefined;
  }
  const precedence = BINARY_PRECEDENCE[token.text];
  return precedence === undefined ? undefined : { precedence, width: 1 };
}

function parseBinary(input: Tokens, pos: number, minPrecedence: number, ctx: ExprContext): Step {
  const lhs = parseCast(input, pos, ctx);
  if (!lhs.ok) return lhs;
  let cur = lhs.pos;

  for (;;) {
    const op = binaryOperator(input, cur);
    if (!op || op.precedence < minPrecedence) break;
    const rhs = parseBinary(input, cur + op.width, op.precedence + 1, ctx);
    if (!rhs.ok) return rhs;
    cur = rhs.pos;
  }

  return ok(null, cur);
}

function isRangeOperator(input: Tokens, pos: number): boolean {
  return isPunctAt(input, pos, "..") || isPunctAt(input, pos, "..=");
}

function parseRange(input: Tokens, pos: number, ctx: ExprContext): Step {
  if (isRangeOperator(input, pos)) {
    return canBeginExpr(input, pos + 1) ? parseBinary(input, pos + 1, 1, ctx) : ok(null, pos + 1);
  }
  const lhs = parseBinary(input, pos, 1, ctx);
  if (!lhs.ok || !isRangeOperator(input, lhs.pos)) return lhs;
  const after = lhs.pos + 1;
  if (ctx.noStruct && isGroupAt(input, after, "brace")) return ok(null, after);
  return canBeginExpr(input, after) ? parseBinary(input, after, 1, ctx) : ok(null, after);
}

function parseAssign(input: Tokens, pos: number, ctx: ExprContext): Step {
  const lhs = parseRange(input, pos, ctx);
  if (!lhs.ok) return lhs;
  const token = input[lhs.pos];
  if (token?.kind === "punct" && ASSIGN_OPS.has(token.text)) {
    return parseAssign(input, lhs.pos + 1, ctx);
  }
  if (token?.kind === "punct" && token.text === ">" && token.spacing === "joint" && isPunctAt(input, lhs.pos + 1, ">=")) {
    return parseAssign(input, lhs.pos + 2, ctx);
  }
  return lhs;
}

function parseExpr(input: Tokens, pos: number, ctx: ExprContext): Step {
  return parseAssign(input, pos, ctx);
}

// ---------------------------------------------------------------------------
// Statements and blocks
// ---------------------------------------------------------------------------

function parseLet(input: Tokens, pos: number): Step {
  let result = parsePattern(input, pos);
  if (result.ok && isPunctAt(input, result.pos, ":")) {
    result = parseType(input, result.pos + 1);
  }
  if (result.ok && isPunctAt(input, result.pos, "=")) {
    result = parseExpr(input, result.pos + 1, STRUCT_OK);
  }
  if (result.ok && isIdentAt(input, result.pos, "else")) {
    result = parseBlock(input, result.pos + 1);
  }
  return result;
}

const fnParam: TokenParser<null> = skip(seq(parser(parsePattern), seq(punct(":"), parser(parseType))));

const fnParams: TokenParser<null> = skip(sepEndBy(fnParam, punct(",")));

function parseFnItem(input: Tokens, pos: number): Step {
  const name = input[pos];
  if (name?.kind !== "ident" || KEYWORDS.has(name.text)) return fail(pos, "function name");
  const params = group("paren", fnParams).parse(input, pos + 1);
  if (!params.ok) return params;
  let cur = params.pos;
  if (isPunctAt(input, cur, "->")) {
    const returnType = parseType(input, cur + 1);
    if (!returnType.ok) return returnType;
    cur = returnType.pos;
  }
  return parseBlock(input, cur);
}

/** A statement without its trailing `;`. */
export function parseStatement(input: Tokens, pos: number): Step {
  if (isIdentAt(input, pos, "let")) return parseLet(input, pos + 1);
  if (isIdentAt(input, pos, "pub") || isIdentAt(input, pos, "fn")) {
    const visibility = parseVisibility(input, pos);
    if (!visibility.ok) return visibility;
    if (!isIdentAt(input, visibility.pos, "fn")) return fail(visibility.pos, "`fn`");
    return parseFnItem(input, visibility.pos + 1);
  }
  return parseExpr(input, pos, STRUCT_OK);
}

function parseBlockContents(input: Tokens, pos: number): Step {
  let cur = pos;
  while (cur < input.length) {
    if (isPunctAt(input, cur, ";")) {
      cur++;
      continue;
    }
    const statement = parseStatement(input, cur);
    if (!statement.ok) return statement;
    cur = statement.pos;
    if (cur >= input.length) break;
    if (isPunctAt(input, cur, ";")) {
      cur++;
    } else if (!isGroupAt(input, cur - 1, "brace")) {
      return fail(cur, "`;` or `}`");
    }
  }
  return ok(null, cur);
}

const blockContents: TokenParser<null> = parser(parseBlockContents);

export function parseBlock(input: Tokens, pos: number): Step {
  return group("brace", blockContents).parse(input, pos);
}

// ---------------------------------------------------------------------------
// Visibility and literals
// ---------------------------------------------------------------------------

function parseVisibilityScope(input: Tokens, pos: number): Step {
  if (isIdentAt(input, pos, "crate") || isIdentAt(input, pos, "self") || isIdentAt(input, pos, "super")) {
    return ok(null, pos + 1);
  }
  if (isIdentAt(input, pos, "in")) return parsePath(input, pos + 1, "type");
  return fail(pos, "`crate`, `self`, `super` or `in`");
}

const visibilityScope: TokenParser<null> = parser(parseVisibilityScope);

/** `pub`, `pub(crate)`, `pub(in path)`, or nothing at all. */
export function parseVisibility(input: Tokens, pos: number): Step {
  if (!isIdentAt(input, pos, "pub")) return ok(null, pos);
  if (isGroupAt(input, pos + 1, "paren")) {
    const scope = group("paren", visibilityScope).parse(input, pos + 1);
    if (scope.ok) return scope;
  }
  return ok(null, pos + 1);
}

export function parseExpression(input: Tokens, pos: number): Step {
  return parseExpr(input, pos, STRUCT_OK);
}

export function parseTypePath(input: Tokens, pos: number): Step {
  return parsePath(input, pos, "type");
}

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

export const expression: TokenParser<null> = parser(parseExpression);
export const ty: TokenParser<null> = parser(parseType);
export const path: TokenParser<null> = parser(parseTypePath);
export const pattern: TokenParser<null> = parser(parsePattern);
export const statement: TokenParser<null> = parser(parseStatement);
export const block: TokenParser<null> = parser(parseBlock);
export const visibility: TokenParser<null> = parser(parseVisibility);
export const literalValue: TokenParser<null> = parser(parseLiteralValue);
