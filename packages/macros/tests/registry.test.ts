/**
 * Tests for the scoped macro registry
 */

import { describe, it, expect, beforeEach } from "vitest";
import { parseTokenTrees } from "@tokenrules/tokens";
import { MacroError, MacroExpander, MacroRegistry, parseMacroRules } from "../src/index.js";
import type { MacroDefinition } from "../src/index.js";

function definition(name: string, body = "() => {}"): MacroDefinition {
  return parseMacroRules(name, parseTokenTrees(body));
}

describe("MacroRegistry", () => {
  let registry: MacroRegistry;

  beforeEach(() => {
    registry = new MacroRegistry();
  });

  it("should store and look up definitions", () => {
    const square = definition("square");
    registry.define("square", square);

    expect(registry.get("square")).toBe(square);
    expect(registry.has("square")).toBe(true);
    expect(registry.lookup("square")).toEqual({ ok: true, definition: square });
  });

  it("should return undefined from get for unknown names", () => {
    expect(registry.get("missing")).toBeUndefined();
  });

  it("should report NotFound from lookup", () => {
    const result = registry.lookup("nope", { start: 2, end: 6 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.diagnostic).toMatchObject({
        code: 1001,
        message: "cannot find macro `nope` in this scope",
        primarySpan: { start: 2, end: 6 },
        help: "define `nope` with `macro_rules!` before it is used",
      });
    }
  });

  it("should reject a second definition in the same scope", () => {
    registry.define("m", definition("m"));
    expect(() => registry.define("m", definition("m"))).toThrow("TR1002: the macro `m` is defined multiple times");
    expect(() => registry.define("m", definition("m"))).toThrow(MacroError);
  });

  it("should let child scopes shadow outer names", () => {
    const outer = definition("m");
    const inner = definition("m", "(x) => {}");
    registry.define("m", outer);
    registry.define("other", definition("other"));

    const child = registry.child();
    child.define("m", inner);

    expect(child.get("m")).toBe(inner);
    expect(registry.get("m")).toBe(outer);
    expect(child.get("other")).toBe(registry.get("other"));
    expect(child.hasOwn("other")).toBe(false);
    expect(child.names()).toEqual(["m", "other"]);
  });

  it("should refuse definitions once sealed", () => {
    registry.seal();
    expect(registry.sealed).toBe(true);
    expect(() => registry.define("late", definition("late"))).toThrow("MacroRegistry: registry is sealed");
  });

  it("should seal enclosing scopes with a child", () => {
    const child = registry.child();
    child.seal();
    expect(registry.sealed).toBe(true);
  });

  it("should be sealed by the expander built over it", () => {
    registry.define("m", definition("m"));
    new MacroExpander(registry, { verbose: false });
    expect(registry.sealed).toBe(true);
  });
});
