import { describe, it, expect, afterEach } from "vitest";
import { config, DEFAULT_RECURSION_LIMIT } from "@tokenrules/core";

describe("config", () => {
  afterEach(() => {
    delete process.env.TOKENRULES_EXPANSION_RECURSIONLIMIT;
    delete process.env.TOKENRULES_DEBUG;
    delete process.env.TOKENRULES_EXPANSION_REQUIREBANG;
    delete process.env.TOKENRULES_DIAGNOSTICS_COLORS;
    config.reset();
  });

  it("should provide defaults", () => {
    config.reset();
    expect(config.get("expansion.recursionLimit")).toBe(DEFAULT_RECURSION_LIMIT);
    expect(config.get("expansion.requireBang")).toBe(false);
    expect(config.isDebugEnabled()).toBe(false);
  });

  it("should read TOKENRULES_* environment variables", () => {
    process.env.TOKENRULES_EXPANSION_RECURSIONLIMIT = "64";
    process.env.TOKENRULES_DEBUG = "1";
    config.reset();
    expect(config.get("expansion.recursionLimit")).toBe(64);
    expect(config.isDebugEnabled()).toBe(true);
  });

  it("should keep 1 and 0 as numbers for numeric keys", () => {
    process.env.TOKENRULES_EXPANSION_RECURSIONLIMIT = "1";
    config.reset();
    expect(config.get("expansion.recursionLimit")).toBe(1);

    process.env.TOKENRULES_EXPANSION_RECURSIONLIMIT = "0";
    config.reset();
    expect(config.get("expansion.recursionLimit")).toBe(0);
  });

  it("should read 1 and 0 as flags for boolean keys", () => {
    process.env.TOKENRULES_EXPANSION_REQUIREBANG = "1";
    process.env.TOKENRULES_DIAGNOSTICS_COLORS = "0";
    config.reset();
    expect(config.get("expansion.requireBang")).toBe(true);
    expect(config.get("diagnostics.colors")).toBe(false);
  });

  it("should let programmatic values win over the environment", () => {
    process.env.TOKENRULES_EXPANSION_RECURSIONLIMIT = "64";
    config.reset();
    config.set({ expansion: { recursionLimit: 8 } });
    expect(config.get("expansion.recursionLimit")).toBe(8);
    expect(config.get("expansion.requireBang")).toBe(false);
  });

  it("should return the fallback for unknown paths", () => {
    expect(config.get("nope.missing", "fallback")).toBe("fallback");
    expect(config.has("nope.missing")).toBe(false);
  });
});
