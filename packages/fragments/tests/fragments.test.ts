import { describe, it, expect } from "vitest";
import { parseTokenTrees } from "@tokenrules/tokens";
import {
  STRUCT_LITERAL_UNSUPPORTED,
  createFragmentOracle,
  defaultFragments,
  isFragmentSpecifier,
} from "../src/index.js";
import type { FragmentGrammar, FragmentSpecifier } from "../src/index.js";

function extent(specifier: FragmentSpecifier, source: string, pos = 0) {
  return defaultFragments[specifier].parse(parseTokenTrees(source), pos);
}

function canBegin(specifier: FragmentSpecifier, source: string): boolean {
  return defaultFragments[specifier].canBegin(parseTokenTrees(source), 0);
}

describe("expr", () => {
  it("stops at a separator", () => {
    expect(extent("expr", "1 + 2 * 3, rest")).toEqual({ ok: true, end: 5 });
    expect(extent("expr", "1; 100")).toEqual({ ok: true, end: 1 });
  });

  it("takes postfix chains", () => {
    expect(extent("expr", "a.b(c)[0]?.len()")).toEqual({ ok: true, end: 9 });
    expect(extent("expr", "t.0")).toEqual({ ok: true, end: 3 });
  });

  it("takes casts, shifts and ranges", () => {
    expect(extent("expr", "x as u8 + 1")).toEqual({ ok: true, end: 5 });
    expect(extent("expr", "v >> 2")).toEqual({ ok: true, end: 4 });
    expect(extent("expr", "0..10")).toEqual({ ok: true, end: 3 });
    expect(extent("expr", "a = b += 1")).toEqual({ ok: true, end: 5 });
  });

  it("takes control flow with blocks", () => {
    expect(extent("expr", "if a { b } else { c }")).toEqual({ ok: true, end: 5 });
    expect(extent("expr", "while let Some(x) = it.next() { f(x); }")).toEqual({ ok: true, end: 10 });
    expect(extent("expr", "for i in 0..n { s += i; }")).toEqual({ ok: true, end: 7 });
    expect(extent("expr", "match x { 1 => a, _ => { b } }")).toEqual({ ok: true, end: 3 });
  });

  it("takes closures and macro invocations", () => {
    expect(extent("expr", "|x| x + 1")).toEqual({ ok: true, end: 6 });
    expect(extent("expr", "move || 0")).toEqual({ ok: true, end: 3 });
    expect(extent("expr", "vec![1, 2] , x")).toEqual({ ok: true, end: 3 });
  });

  it("rejects struct literals at the path", () => {
    expect(extent("expr", "Foo {}")).toEqual({ ok: false, pos: 0, expected: STRUCT_LITERAL_UNSUPPORTED });
    expect(extent("expr", "1 + a::B { x: 1 }")).toEqual({ ok: false, pos: 2, expected: STRUCT_LITERAL_UNSUPPORTED });
  });

  it("fails on a missing operand", () => {
    expect(extent("expr", "1 +")).toEqual({ ok: false, pos: 2, expected: "expression" });
  });

  it("knows which tokens can begin an expression", () => {
    expect(canBegin("expr", "-x")).toBe(true);
    expect(canBegin("expr", "match x {}")).toBe(true);
    expect(canBegin("expr", ", x")).toBe(false);
    expect(canBegin("expr", "let x")).toBe(false);
    expect(canBegin("expr", "")).toBe(false);
  });
});

describe("ty", () => {
  it("takes nested generics", () => {
    expect(extent("ty", "Vec<Option<u8>>, x")).toEqual({ ok: true, end: 7 });
  });

  it("takes references, arrays and function types", () => {
    expect(extent("ty", "&mut [u8]")).toEqual({ ok: true, end: 3 });
    expect(extent("ty", "[u8; 4]")).toEqual({ ok: true, end: 1 });
    expect(extent("ty", "fn(i32) -> bool")).toEqual({ ok: true, end: 4 });
    expect(extent("ty", "(u8, String)")).toEqual({ ok: true, end: 1 });
  });

  it("cannot begin with a literal", () => {
    expect(canBegin("ty", "1")).toBe(false);
  });
});

describe("path", () => {
  it("takes segments and generic arguments", () => {
    expect(extent("path", "std::collections::HashMap<K, V> rest")).toEqual({ ok: true, end: 10 });
    expect(extent("path", "::a")).toEqual({ ok: true, end: 2 });
  });

  it("takes generic arguments behind `::`", () => {
    expect(extent("path", "a::b::<C>")).toEqual({ ok: true, end: 7 });
    expect(extent("path", "Vec::<u8>::new rest")).toEqual({ ok: true, end: 7 });
  });

  it("fails on a dangling separator", () => {
    expect(extent("path", "a::")).toEqual({ ok: false, pos: 2, expected: "path segment" });
  });
});

describe("pat", () => {
  it("takes alternatives", () => {
    expect(extent("pat", "Some(x) | None => 1")).toEqual({ ok: true, end: 4 });
  });

  it("takes bindings with subpatterns and ranges", () => {
    expect(extent("pat", "ref mut y @ 1..=5")).toEqual({ ok: true, end: 7 });
  });

  it("takes struct patterns", () => {
    expect(extent("pat", "Point { x, y: 0, .. }")).toEqual({ ok: true, end: 2 });
  });

  it("takes wildcards, tuples and slices", () => {
    expect(extent("pat", "_")).toEqual({ ok: true, end: 1 });
    expect(extent("pat", "(a, _)")).toEqual({ ok: true, end: 1 });
    expect(extent("pat", "[first, ..]")).toEqual({ ok: true, end: 1 });
  });
});

describe("stmt", () => {
  it("takes a let statement without its semicolon", () => {
    expect(extent("stmt", "let x: u8 = 1; next")).toEqual({ ok: true, end: 6 });
  });

  it("takes function items", () => {
    expect(extent("stmt", "fn f(a: u8) -> u8 { a }")).toEqual({ ok: true, end: 6 });
    expect(extent("stmt", "pub(crate) fn g() {}")).toEqual({ ok: true, end: 6 });
  });
});

describe("block", () => {
  it("takes one brace group", () => {
    expect(extent("block", "{ let a = 1; a + 1 } tail")).toEqual({ ok: true, end: 1 });
    expect(canBegin("block", "(x)")).toBe(false);
  });

  it("requires semicolons between statements", () => {
    expect(extent("block", "{ let a = 1 a }")).toEqual({ ok: false, pos: 0, expected: "`;` or `}`" });
  });

  it("lets block-like statements stand without semicolons", () => {
    expect(extent("block", "{ if a { b } c }")).toEqual({ ok: true, end: 1 });
  });
});

describe("single-token fragments", () => {
  it("literal takes an optional minus", () => {
    expect(extent("literal", "-5")).toEqual({ ok: true, end: 2 });
    expect(extent("literal", "true")).toEqual({ ok: true, end: 1 });
    expect(canBegin("literal", "x")).toBe(false);
  });

  it("ident takes keywords but not the wildcard", () => {
    expect(canBegin("ident", "match")).toBe(true);
    expect(canBegin("ident", "_")).toBe(false);
    expect(extent("ident", "foo bar")).toEqual({ ok: true, end: 1 });
  });

  it("tt takes a whole group", () => {
    expect(extent("tt", "(a b) c")).toEqual({ ok: true, end: 1 });
    expect(canBegin("tt", "")).toBe(false);
  });

  it("vis may be empty", () => {
    expect(extent("vis", "pub(crate) fn")).toEqual({ ok: true, end: 2 });
    expect(extent("vis", "pub fn")).toEqual({ ok: true, end: 1 });
    expect(extent("vis", "fn")).toEqual({ ok: true, end: 0 });
    expect(canBegin("vis", "fn")).toBe(true);
  });
});

describe("createFragmentOracle", () => {
  const upperOnly: FragmentGrammar = {
    canBegin: (tokens, pos) => {
      const token = tokens[pos];
      return token?.kind === "ident" && /^[A-Z]/.test(token.text);
    },
    parse: (_tokens, pos) => ({ ok: true, end: pos + 1 }),
  };

  it("replaces only the overridden specifiers", () => {
    const oracle = createFragmentOracle({ ident: upperOnly });
    expect(oracle("ident")).toBe(upperOnly);
    expect(oracle("expr")).toBe(defaultFragments.expr);
    expect(oracle("ident").canBegin(parseTokenTrees("lower"), 0)).toBe(false);
  });
});

describe("isFragmentSpecifier", () => {
  it("recognizes the specifier names", () => {
    expect(isFragmentSpecifier("expr")).toBe(true);
    expect(isFragmentSpecifier("vis")).toBe(true);
    expect(isFragmentSpecifier("item")).toBe(false);
  });
});
