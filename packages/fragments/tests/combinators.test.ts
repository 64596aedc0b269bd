import { describe, it, expect } from "vitest";
import { parseTokenTrees } from "@tokenrules/tokens";
import {
  TokenParseError,
  alt,
  eof,
  group,
  identifier,
  keyword,
  lazy,
  literalToken,
  many,
  many1,
  map,
  not,
  optional,
  punct,
  sepBy,
  sepEndBy,
  seq,
} from "../src/index.js";
import type { TokenParser } from "../src/index.js";

const toks = (source: string) => parseTokenTrees(source);

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

describe("punct", () => {
  it("matches punctuation by spelling", () => {
    const r = punct(",").parse(toks("a , b"), 1);
    expect(r.ok).toBe(true);
    expect(r.pos).toBe(2);
  });

  it("fails on other tokens", () => {
    expect(punct(",").parse(toks("a"))).toEqual({ ok: false, pos: 0, expected: "`,`" });
  });
});

describe("keyword", () => {
  it("matches an identifier with the exact spelling", () => {
    expect(keyword("let").parse(toks("let x")).pos).toBe(1);
    expect(keyword("let").parse(toks("x"))).toEqual({ ok: false, pos: 0, expected: "`let`" });
  });
});

describe("identifier", () => {
  it("skips reserved words", () => {
    const ident = identifier(new Set(["let"]));
    expect(ident.parse(toks("x")).ok).toBe(true);
    expect(ident.parse(toks("let"))).toEqual({ ok: false, pos: 0, expected: "identifier" });
  });
});

describe("group", () => {
  it("requires the inner parser to consume the whole group", () => {
    const list = group("paren", sepEndBy(literalToken(), punct(",")));
    const r = list.parse(toks("(1, 2,)"));
    expect(r.ok && r.value.map((t) => t.text)).toEqual(["1", "2"]);
    expect(r.pos).toBe(1);
  });

  it("reports inner failures at the group position", () => {
    expect(group("paren", literalToken()).parse(toks("(x)"))).toEqual({ ok: false, pos: 0, expected: "literal" });
  });

  it("reports leftover tokens inside the group", () => {
    expect(group("paren", literalToken()).parse(toks("(1 2)"))).toEqual({
      ok: false,
      pos: 0,
      expected: "end of `(...)` group, found `2`",
    });
  });

  it("checks the delimiter", () => {
    expect(group("bracket", eof()).parse(toks("()"))).toEqual({ ok: false, pos: 0, expected: "`[`" });
  });
});

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

describe("seq", () => {
  it("runs parsers in order", () => {
    const r = seq(keyword("let"), identifier()).parse(toks("let x"));
    expect(r.ok && r.value.map((t) => t.text)).toEqual(["let", "x"]);
  });

  it("propagates the first failure", () => {
    expect(seq(keyword("let"), identifier()).parse(toks("let 1"))).toEqual({
      ok: false,
      pos: 1,
      expected: "identifier",
    });
  });
});

describe("alt", () => {
  it("takes the first success", () => {
    expect(alt(keyword("a"), keyword("b")).parse(toks("b")).pos).toBe(1);
  });

  it("joins expectations of equally far failures", () => {
    expect(alt(keyword("a"), keyword("b")).parse(toks("c"))).toEqual({
      ok: false,
      pos: 0,
      expected: "`a` or `b`",
    });
  });

  it("reports the furthest failure", () => {
    const p = alt(map(seq(keyword("a"), keyword("b")), () => 1), map(keyword("c"), () => 2));
    expect(p.parse(toks("a x"))).toEqual({ ok: false, pos: 1, expected: "`b`" });
  });
});

describe("repetition", () => {
  it("many stops on zero-width matches", () => {
    expect(many(optional(keyword("a"))).parse(toks("b"))).toEqual({ ok: true, value: [], pos: 0 });
  });

  it("many1 needs at least one item", () => {
    expect(many1(keyword("a")).parse(toks("b")).ok).toBe(false);
    expect(many1(keyword("a")).parse(toks("a a b")).pos).toBe(2);
  });

  it("sepBy leaves a trailing separator", () => {
    const r = sepBy(literalToken(), punct(",")).parse(toks("1, 2,"));
    expect(r.ok && r.value.length).toBe(2);
    expect(r.pos).toBe(3);
  });

  it("sepEndBy consumes a trailing separator", () => {
    const r = sepEndBy(literalToken(), punct(",")).parse(toks("1, 2,"));
    expect(r.ok && r.value.length).toBe(2);
    expect(r.pos).toBe(4);
  });
});

describe("not", () => {
  it("succeeds without consuming when the parser fails", () => {
    expect(not(keyword("a")).parse(toks("b"))).toEqual({ ok: true, value: null, pos: 0 });
    expect(not(keyword("a")).parse(toks("a"))).toEqual({ ok: false, pos: 0, expected: "not `a`" });
  });
});

describe("lazy", () => {
  it("supports recursive grammars", () => {
    const depth: TokenParser<number> = lazy(() =>
      alt(
        map(group("paren", depth), (n) => n + 1),
        map(eof(), () => 0),
      ),
    );
    expect(depth.parse(toks("((()))"))).toEqual({ ok: true, value: 3, pos: 1 });
  });
});

describe("parseAll", () => {
  it("returns the value when all input is consumed", () => {
    expect(map(literalToken(), (t) => t.text).parseAll(toks("42"))).toBe("42");
  });

  it("throws TokenParseError on leftover input", () => {
    expect(() => literalToken().parseAll(toks("1 2"))).toThrow(TokenParseError);
    expect(() => literalToken().parseAll(toks("1 2"))).toThrow(
      "Parse error at token 1: expected end of input, found `2`",
    );
  });

  it("throws TokenParseError on failure", () => {
    expect(() => literalToken().parseAll(toks(""))).toThrow(
      "Parse error at token 0: expected literal, found end of macro input",
    );
  });
});
