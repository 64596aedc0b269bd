/**
 * Tests for pattern matching, binding and rule selection
 */

import { describe, it, expect } from "vitest";
import { STRUCT_LITERAL_UNSUPPORTED } from "@tokenrules/fragments";
import { parseTokenTrees, printTokens } from "@tokenrules/tokens";
import {
  matchFailureDiagnostic,
  matchPattern,
  parseMacroRules,
  parsePatternNodes,
  selectRule,
} from "../src/index.js";
import type { Binding, MatchResult } from "../src/index.js";

function match(pattern: string, input: string): MatchResult {
  return matchPattern(parsePatternNodes("m", parseTokenTrees(pattern)), parseTokenTrees(input));
}

function text(binding: Binding | undefined): string {
  if (binding?.kind !== "single") throw new Error("expected a single binding");
  return printTokens(binding.tokens);
}

function items(binding: Binding | undefined): readonly Binding[] {
  if (binding?.kind !== "sequence") throw new Error("expected a sequence binding");
  return binding.items;
}

describe("matchPattern", () => {
  it("binds fragments separated by literals", () => {
    const result = match("$e:expr; $n:expr", "1; 100");

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(text(result.bindings.get("e"))).toBe("1");
      expect(text(result.bindings.get("n"))).toBe("100");
      expect(result.bindings.names()).toEqual(["e", "n"]);
      expect(result.bindings.depthOf("e")).toBe(0);
    }
  });

  it("captures whole expressions", () => {
    const result = match("$e:expr, $f:expr", "a * (b + c), d");
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(text(result.bindings.get("e"))).toBe("a*(b+c)");
    }
  });

  it("reports literal mismatches", () => {
    expect(match("a , b", "a ; b")).toEqual({
      ok: false,
      failure: expect.objectContaining({
        kind: "mismatch",
        index: 1,
        expected: "`,`",
        actual: "`;`",
        progress: 1,
        fatal: false,
      }),
    });
  });

  it("treats a fragment that cannot begin as a plain mismatch", () => {
    expect(match("$i:ident", "1")).toEqual({
      ok: false,
      failure: expect.objectContaining({ kind: "mismatch", expected: "identifier", actual: "`1`", fatal: false }),
    });
  });

  it("treats a fragment that fails to parse as fatal", () => {
    expect(match("$x:expr", "Foo{}")).toEqual({
      ok: false,
      failure: expect.objectContaining({
        kind: "malformed-fragment",
        index: 0,
        expected: STRUCT_LITERAL_UNSUPPORTED,
        actual: "`Foo`",
        fatal: true,
        fragment: "expr",
      }),
    });
  });

  it("requires the whole input to be consumed", () => {
    expect(match("$x:expr", "1 2")).toEqual({
      ok: false,
      failure: expect.objectContaining({ index: 1, expected: "end of macro input", actual: "`2`", progress: 1 }),
    });
  });

  it("collects repetitions into sequences", () => {
    const result = match("$($x:expr),*", "1, 2, 3");
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(items(result.bindings.get("x")).map(text)).toEqual(["1", "2", "3"]);
      expect(result.bindings.depthOf("x")).toBe(1);
    }
  });

  it("does not consume a trailing separator", () => {
    expect(match("$($x:expr),*", "1, 2, 3,")).toEqual({
      ok: false,
      failure: expect.objectContaining({
        index: 6,
        expected: "expression",
        actual: "end of macro input",
        progress: 6,
      }),
    });
  });

  it("binds empty sequences for zero iterations", () => {
    const result = match("$($x:expr),*", "");
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.bindings.get("x")).toEqual({ kind: "sequence", items: [] });
      expect(result.bindings.depthOf("x")).toBe(1);
    }
  });

  it("requires one iteration for `+`", () => {
    expect(match("$($x:ident)+", "1")).toEqual({
      ok: false,
      failure: expect.objectContaining({ index: 0, expected: "identifier", actual: "`1`" }),
    });
  });

  it("allows at most one iteration for `?`", () => {
    const once = match("$($x:ident)? ;", "a ;");
    const never = match("$($x:ident)? ;", ";");
    expect(once.ok && items(once.bindings.get("x")).length).toBe(1);
    expect(never.ok && items(never.bindings.get("x")).length).toBe(0);
    expect(match("$($x:ident)? ;", "a b ;")).toEqual({
      ok: false,
      failure: expect.objectContaining({ index: 1, expected: "`;`", actual: "`b`" }),
    });
  });

  it("nests sequences for nested repetitions", () => {
    const result = match("$($k:ident: [$($v:expr),*]);*", "a: [1, 2]; b: []");
    expect(result.ok).toBe(true);
    if (result.ok) {
      const { bindings } = result;
      expect(items(bindings.get("k")).map(text)).toEqual(["a", "b"]);
      expect(items(bindings.get("v")).map((inner) => items(inner).map(text))).toEqual([["1", "2"], []]);
      expect(bindings.depthOf("k")).toBe(1);
      expect(bindings.depthOf("v")).toBe(2);
    }
  });

  it("rejects a second binding of the same name", () => {
    expect(match("$x:ident $x:ident", "a b")).toEqual({
      ok: false,
      failure: expect.objectContaining({ kind: "duplicate-binding", name: "x", fatal: true }),
    });
  });

  it("matches groups by delimiter", () => {
    expect(match("($x:expr)", "[1]")).toEqual({
      ok: false,
      failure: expect.objectContaining({ index: 0, expected: "`(`", actual: "`[...]`" }),
    });
  });

  it("requires a group's contents to be consumed entirely", () => {
    expect(match("($x:expr)", "(1 2)")).toEqual({
      ok: false,
      failure: expect.objectContaining({ index: 1, expected: "`)`", actual: "`2`", progress: 2 }),
    });
  });
});

describe("selectRule", () => {
  const rules = (source: string) => parseMacroRules("m", parseTokenTrees(source));
  const input = (source: string) => parseTokenTrees(source);

  it("picks the first rule that matches", () => {
    const selection = selectRule(rules("(a) => {1}; ($x:ident) => {2}; ($y:ident) => {3}"), input("b"));
    expect(selection.ok).toBe(true);
    expect(selection.ruleIndex).toBe(1);
  });

  it("reports the rule that progressed furthest", () => {
    const selection = selectRule(rules("(a b c) => {}; (a $x:literal) => {}"), input("a b d"));
    expect(selection).toEqual({
      ok: false,
      ruleIndex: 0,
      failure: expect.objectContaining({ expected: "`c`", actual: "`d`", progress: 2 }),
    });
  });

  it("prefers the earliest rule on ties", () => {
    const selection = selectRule(rules("(a b) => {}; (a c) => {}"), input("a d"));
    expect(selection).toEqual({
      ok: false,
      ruleIndex: 0,
      failure: expect.objectContaining({ expected: "`b`", progress: 1 }),
    });
  });

  it("stops at a malformed fragment", () => {
    const selection = selectRule(rules("($x:expr) => {}; (Foo {}) => {}"), input("Foo {}"));
    expect(selection).toEqual({
      ok: false,
      ruleIndex: 0,
      failure: expect.objectContaining({ kind: "malformed-fragment" }),
    });
  });
});

describe("matchFailureDiagnostic", () => {
  it("describes malformed fragments", () => {
    const result = match("$x:expr", "Foo{}");
    if (result.ok) throw new Error("expected a failure");

    const diagnostic = matchFailureDiagnostic("m", result.failure);
    expect(diagnostic.code).toBe(2002);
    expect(diagnostic.message).toBe(
      `malformed \`expr\` fragment in invocation of \`m\`: expected ${STRUCT_LITERAL_UNSUPPORTED}, found \`Foo\``,
    );
    expect(diagnostic.primarySpan).toEqual({ start: 0, end: 3 });
  });

  it("describes mismatches", () => {
    const result = match("a , b", "a ; b");
    if (result.ok) throw new Error("expected a failure");

    expect(matchFailureDiagnostic("m", result.failure).message).toBe(
      "no rules of `m` matched this invocation: expected `,`, found `;`",
    );
  });

  it("describes duplicate bindings", () => {
    const result = match("$x:ident $x:ident", "a b");
    if (result.ok) throw new Error("expected a failure");

    expect(matchFailureDiagnostic("m", result.failure).message).toBe("duplicate matcher binding `$x` in `m`");
  });
});
