/**
 * Tests for macro_rules! definition parsing and the string API
 */

import { describe, it, expect } from "vitest";
import { parseTokenTrees } from "@tokenrules/tokens";
import {
  MacroError,
  MacroRegistry,
  defineMacros,
  defineSyntaxMacro,
  parseMacroDefinitions,
  parseMacroRules,
} from "../src/index.js";

const lex = (source: string) => parseTokenTrees(source);

describe("parseMacroRules", () => {
  it("parses metavariables, literals and references", () => {
    const definition = parseMacroRules("add", lex("($a:expr, $b:expr) => { $a + $b };"));

    expect(definition.name).toBe("add");
    expect(definition.rules).toHaveLength(1);
    expect(definition.rules[0].pattern).toMatchObject([
      { kind: "metavariable", name: "a", fragment: "expr" },
      { kind: "literal", token: { kind: "punct", text: "," } },
      { kind: "metavariable", name: "b", fragment: "expr" },
    ]);
    expect(definition.rules[0].template).toMatchObject([
      { kind: "metavariable-ref", name: "a" },
      { kind: "literal", token: { kind: "punct", text: "+" } },
      { kind: "metavariable-ref", name: "b" },
    ]);
  });

  it("parses repetitions with separators", () => {
    const definition = parseMacroRules("list", lex("($($x:expr),*) => (LIST[$($x),*])"));
    const [rule] = definition.rules;

    expect(rule.pattern).toMatchObject([
      {
        kind: "repetition",
        quantifier: "*",
        separator: { kind: "punct", text: "," },
        body: [{ kind: "metavariable", name: "x", fragment: "expr" }],
      },
    ]);
    expect(rule.template).toMatchObject([
      { kind: "literal", token: { kind: "ident", text: "LIST" } },
      {
        kind: "group",
        delimiter: "bracket",
        inner: [
          {
            kind: "repetition-echo",
            quantifier: "*",
            separator: { kind: "punct", text: "," },
            body: [{ kind: "metavariable-ref", name: "x" }],
          },
        ],
      },
    ]);
  });

  it("reads an operator right after the group as the quantifier", () => {
    const [rule] = parseMacroRules("opt", lex("($($x:ident)? ;) => ()")).rules;
    expect(rule.pattern).toMatchObject([
      { kind: "repetition", quantifier: "?", body: [{ kind: "metavariable", name: "x" }] },
      { kind: "literal", token: { text: ";" } },
    ]);
    expect(rule.pattern[0]).not.toHaveProperty("separator.text");
  });

  it("keeps rules in declaration order", () => {
    const definition = parseMacroRules("m", lex("(a) => {1}; (b) => {2};"));
    expect(definition.rules.map((rule) => rule.pattern)).toMatchObject([
      [{ kind: "literal", token: { text: "a" } }],
      [{ kind: "literal", token: { text: "b" } }],
    ]);
  });

  it("rejects a metavariable without a fragment specifier", () => {
    expect(() => parseMacroRules("m", lex("($x) => ()"))).toThrow(
      "TR1003: invalid macro definition for `m`: missing fragment specifier for `$x`",
    );
  });

  it("rejects unknown fragment specifiers", () => {
    expect(() => parseMacroRules("m", lex("($x:foo) => ()"))).toThrow("invalid fragment specifier `foo`");
  });

  it("rejects a separator on `?`", () => {
    expect(() => parseMacroRules("m", lex("($($x:expr),?) => ()"))).toThrow(
      "the `?` repetition operator does not take a separator",
    );
  });

  it("rejects empty repetitions in matchers", () => {
    expect(() => parseMacroRules("m", lex("($()*) => ()"))).toThrow("repetition matches empty token tree");
  });

  it("rejects a repetition without an operator", () => {
    expect(() => parseMacroRules("m", lex("($($x:expr)) => ()"))).toThrow(
      "expected one of `*`, `+` or `?` after repetition, found end of macro input",
    );
  });

  it("rejects a missing arrow", () => {
    expect(() => parseMacroRules("m", lex("(a) (b)"))).toThrow("expected `=>` after matcher, found `(...)`");
  });

  it("rejects rules not separated by `;`", () => {
    expect(() => parseMacroRules("m", lex("(a) => {} (b) => {}"))).toThrow(
      "expected `;` between rules, found `(...)`",
    );
  });

  it("rejects an empty rule list", () => {
    expect(() => parseMacroRules("m", [])).toThrow("macro has no rules");
  });

  it("throws MacroError carrying the diagnostic", () => {
    try {
      parseMacroRules("m", lex("($x:nope) => ()"));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MacroError);
      if (error instanceof MacroError) {
        expect(error.code).toBe(1003);
        expect(error.kind).toBe("InvalidMacroDefinition");
        expect(error.diagnostic.primarySpan).toEqual({ start: 4, end: 8 });
      }
    }
  });
});

describe("parseMacroDefinitions", () => {
  it("reads every macro_rules! item", () => {
    const definitions = parseMacroDefinitions(
      lex("macro_rules! a { () => {} } macro_rules! b ( () => () );"),
    );
    expect(definitions.map((definition) => definition.name)).toEqual(["a", "b"]);
  });

  it("requires `;` after a paren body", () => {
    expect(() => parseMacroDefinitions(lex("macro_rules! b ( () => () )"))).toThrow(
      "expected `;` after `(...` macro body, found end of macro input",
    );
  });

  it("rejects anything that is not a macro_rules! item", () => {
    expect(() => parseMacroDefinitions(lex("fn f() {}"))).toThrow("expected `macro_rules!`, found `fn`");
  });
});

describe("defineMacros", () => {
  it("registers each definition", () => {
    const registry = new MacroRegistry();
    const names = defineMacros(registry, "macro_rules! one { () => (1); } macro_rules! two { () => (2); }");

    expect(names).toEqual(["one", "two"]);
    expect(registry.has("one")).toBe(true);
    expect(registry.has("two")).toBe(true);
  });
});

describe("defineSyntaxMacro", () => {
  it("defines a single-arm macro", () => {
    const registry = new MacroRegistry();
    const definition = defineSyntaxMacro(registry, "add", { pattern: "$a:expr, $b:expr", expand: "$a + $b" });

    expect(registry.get("add")).toBe(definition);
    expect(definition.rules).toHaveLength(1);
  });

  it("defines a multi-arm macro in arm order", () => {
    const registry = new MacroRegistry();
    defineSyntaxMacro(registry, "pick", {
      arms: [
        { pattern: "first", expand: "1" },
        { pattern: "$x:expr", expand: "$x" },
      ],
    });
    expect(registry.get("pick")?.rules).toHaveLength(2);
  });

  it("reports lexer errors as invalid definitions", () => {
    const registry = new MacroRegistry();
    expect(() => defineSyntaxMacro(registry, "bad", { pattern: '"abc', expand: "" })).toThrow(
      /^TR1003: invalid macro definition for `bad`: /,
    );
  });

  it("rejects an empty arm list", () => {
    const registry = new MacroRegistry();
    expect(() => defineSyntaxMacro(registry, "none", { arms: [] })).toThrow("macro has no rules");
  });
});
