/**
 * Macro Registry
 *
 * Maps macro names to definitions. Scopes nest: a child registry may shadow
 * names of its parent, and lookups walk outward until a definition is found.
 * Registries are populated up front and sealed before expansion begins.
 *
 * @example
 * ```typescript
 * const registry = new MacroRegistry();
 * registry.define("square", parseMacroRules("square", body));
 *
 * const inner = registry.child();
 * inner.define("square", otherDefinition); // shadows the outer one
 * ```
 */

import { createGenericRegistry, type GenericRegistry, type RichDiagnostic, type Span } from "@tokenrules/core";
import { MacroError, duplicateDefinition, notFound } from "./errors.js";
import type { MacroDefinition } from "./types.js";

export type MacroLookup = { ok: true; definition: MacroDefinition } | { ok: false; diagnostic: RichDiagnostic };

export class MacroRegistry {
  private readonly entries: GenericRegistry<string, MacroDefinition> = createGenericRegistry({
    name: "MacroRegistry",
    duplicateStrategy: "error",
  });

  constructor(readonly parent?: MacroRegistry) {}

  /**
   * Register a definition in this scope.
   *
   * @throws MacroError (TR1002) if the name is already defined in this scope
   * @throws Error if the registry is sealed
   */
  define(name: string, definition: MacroDefinition): void {
    if (this.entries.has(name)) {
      throw new MacroError(duplicateDefinition(name, definition.span));
    }
    this.entries.set(name, definition);
  }

  get(name: string): MacroDefinition | undefined {
    for (let scope: MacroRegistry | undefined = this; scope; scope = scope.parent) {
      const definition = scope.entries.get(name);
      if (definition) return definition;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  lookup(name: string, span?: Span): MacroLookup {
    const definition = this.get(name);
    if (definition) return { ok: true, definition };
    return { ok: false, diagnostic: notFound(name, span) };
  }

  /** Whether `name` is defined in this scope itself, ignoring parents */
  hasOwn(name: string): boolean {
    return this.entries.has(name);
  }

  child(): MacroRegistry {
    return new MacroRegistry(this);
  }

  /** Seal this scope and every enclosing one. */
  seal(): void {
    for (let scope: MacroRegistry | undefined = this; scope; scope = scope.parent) {
      scope.entries.seal();
    }
  }

  get sealed(): boolean {
    return this.entries.sealed;
  }

  /** Names visible from this scope, innermost first, without duplicates */
  names(): string[] {
    const seen = new Set<string>();
    for (let scope: MacroRegistry | undefined = this; scope; scope = scope.parent) {
      for (const name of scope.entries.keys()) seen.add(name);
    }
    return [...seen];
  }
}
