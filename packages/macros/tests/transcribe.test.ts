/**
 * Tests for transcription and hygiene marks
 */

import { describe, it, expect } from "vitest";
import {
  group,
  ident,
  parseTokenTrees,
  printTokens,
  punct,
  sameIdentifier,
  type IdentToken,
  type TokenTree,
} from "@tokenrules/tokens";
import {
  HygieneContext,
  matchPattern,
  parsePatternNodes,
  parseTemplateNodes,
  templateReferences,
  transcribe,
} from "../src/index.js";
import type { TranscribeResult } from "../src/index.js";

function expand(pattern: string, template: string, input: string, hygiene = new HygieneContext()): TranscribeResult {
  const matched = matchPattern(parsePatternNodes("m", parseTokenTrees(pattern)), parseTokenTrees(input));
  if (!matched.ok) throw new Error(`pattern did not match: ${matched.failure.expected}`);
  return transcribe(parseTemplateNodes("m", parseTokenTrees(template)), matched.bindings, hygiene.newContext("m"));
}

function printed(result: TranscribeResult): string {
  if (!result.ok) throw new Error(result.diagnostic.message);
  return printTokens(result.tokens);
}

function identAt(tokens: readonly TokenTree[], index: number): IdentToken {
  const token = tokens[index];
  if (token?.kind !== "ident") throw new Error(`expected an identifier at ${index}`);
  return token;
}

describe("transcribe", () => {
  it("substitutes single bindings", () => {
    expect(printed(expand("$e:expr; $n:expr", "REPEAT($e,$n)", "1; 100"))).toBe("REPEAT(1,100)");
  });

  it("echoes repetitions with separators", () => {
    expect(printed(expand("$($x:expr),*", "LIST[$($x),*]", "1, 2, 3"))).toBe("LIST[1,2,3]");
  });

  it("echoes zero times for an empty sequence", () => {
    expect(printed(expand("$($x:expr),*", "LIST[$($x),*]", ""))).toBe("LIST[]");
  });

  it("repeats shallower bindings inside an echo", () => {
    expect(printed(expand("$p:ident $($x:expr),*", "$($p+$x);*", "f 1, 2"))).toBe("f+1;f+2");
  });

  it("echoes nested repetitions", () => {
    const result = expand("$($k:ident: [$($v:expr),*]);*", "$($k($($v),*))*", "a: [1, 2]; b: []");
    expect(printed(result)).toBe("a(1,2)b()");
  });

  it("rejects echoes over sequences of different lengths", () => {
    const result = expand("$($a:ident)* ; $($b:ident)*", "$($a $b)*", "x y z ; p q");
    expect(result).toMatchObject({
      ok: false,
      diagnostic: { code: 3001, message: "meta-variable `$a` repeats 3 times, but `$b` repeats 2 times" },
    });
  });

  it("rejects a repeating variable outside an echo", () => {
    expect(expand("$($a:ident)*", "$a", "x y")).toMatchObject({
      ok: false,
      diagnostic: { code: 3002, message: "variable `$a` is still repeating at this depth" },
    });
  });

  it("rejects an echo with no repeating variable", () => {
    expect(expand("$a:ident", "$($a)*", "q")).toMatchObject({ ok: false, diagnostic: { code: 3003 } });
    expect(expand("$a:ident", "$(x)*", "q")).toMatchObject({ ok: false, diagnostic: { code: 3003 } });
  });

  it("rejects references the pattern never binds", () => {
    expect(expand("$a:ident", "$a + $nope", "q")).toMatchObject({
      ok: false,
      diagnostic: { code: 3004, message: "unknown macro variable `$nope`" },
    });
  });

  it("lists template references in first-use order", () => {
    expect(templateReferences(parseTemplateNodes("m", parseTokenTrees("$b [$($a $b),*] $c")))).toEqual([
      "b",
      "a",
      "c",
    ]);
  });
});

describe("hygiene", () => {
  it("marks template identifiers but not captured ones", () => {
    const result = expand("$x:ident", "let tmp = $x;", "tmp");
    if (!result.ok) throw new Error(result.diagnostic.message);

    const introduced = identAt(result.tokens, 1);
    const captured = identAt(result.tokens, 3);
    expect(introduced.text).toBe("tmp");
    expect(captured.text).toBe("tmp");
    expect(introduced.marks.map(String)).toEqual(["m#1"]);
    expect(captured.marks).toEqual([]);
    expect(sameIdentifier(introduced, captured)).toBe(false);
  });

  it("gives every expansion a fresh id", () => {
    const hygiene = new HygieneContext();
    const first = expand("", "x", "", hygiene);
    const second = expand("", "x", "", hygiene);
    if (!first.ok || !second.ok) throw new Error("expected both expansions to succeed");

    expect(sameIdentifier(identAt(first.tokens, 0), identAt(second.tokens, 0))).toBe(false);
    expect(hygiene.allocated).toBe(2);
  });

  it("numbers ids per context", () => {
    const a = new HygieneContext();
    const b = new HygieneContext();
    expect(a.newContext("m").serial).toBe(1);
    expect(a.newContext("m").serial).toBe(2);
    expect(b.newContext("n").toString()).toBe("n#1");
  });

  it("stamps group contents deeply and leaves other tokens alone", () => {
    const hygiene = new HygieneContext();
    const id = hygiene.newContext("m");
    const comma = punct(",");
    const stamped = hygiene.stamp(group("paren", [ident("a"), comma, group("bracket", [ident("b")])]), id);

    expect(stamped).toMatchObject({
      kind: "group",
      delimiter: "paren",
      tokens: [
        { kind: "ident", text: "a", marks: [id] },
        comma,
        { kind: "group", tokens: [{ kind: "ident", text: "b", marks: [id] }] },
      ],
    });
    expect(hygiene.stamp(comma, id)).toBe(comma);
  });
});
