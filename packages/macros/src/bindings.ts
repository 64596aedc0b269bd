/**
 * Binder / Repetition Tracker
 *
 * Captures are recorded per repetition iteration in a fresh child binder.
 * When a repetition ends, every metavariable declared in its body is bound in
 * the parent as a sequence of per-iteration bindings. The body's names are
 * collected statically, so a repetition that matched zero times still binds
 * each of its names to an empty sequence.
 */

import type { Span } from "@tokenrules/core";
import type { FragmentSpecifier } from "@tokenrules/fragments";
import type { TokenSlice } from "@tokenrules/tokens";
import type { PatternNode } from "./types.js";

export type Binding =
  | { kind: "single"; fragment: FragmentSpecifier; tokens: TokenSlice; span?: Span }
  | { kind: "sequence"; items: readonly Binding[] };

interface BindingEntry {
  binding: Binding;
  /** Number of repetitions the metavariable is nested in */
  depth: number;
}

/**
 * Metavariables declared by a pattern, with the repetition depth of each.
 * Duplicates keep the first depth seen.
 */
export function collectMetavariables(nodes: readonly PatternNode[]): Map<string, number> {
  const result = new Map<string, number>();
  const visit = (list: readonly PatternNode[], depth: number): void => {
    for (const node of list) {
      switch (node.kind) {
        case "metavariable":
          if (!result.has(node.name)) result.set(node.name, depth);
          break;
        case "repetition":
          visit(node.body, depth + 1);
          break;
        case "group":
          visit(node.inner, depth);
          break;
        case "literal":
          break;
      }
    }
  };
  visit(nodes, 0);
  return result;
}

/** Read-only view of the captures of a successful match. */
export class BindingEnvironment {
  constructor(private readonly entries: ReadonlyMap<string, BindingEntry>) {}

  get(name: string): Binding | undefined {
    return this.entries.get(name)?.binding;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /** Repetition depth the name was declared at; undefined when unbound */
  depthOf(name: string): number | undefined {
    return this.entries.get(name)?.depth;
  }

  get size(): number {
    return this.entries.size;
  }
}

export class Binder {
  private readonly entries = new Map<string, BindingEntry>();

  /**
   * Bind a name in this iteration scope.
   *
   * @returns false if the name is already bound here
   */
  bind(name: string, binding: Binding, depth = 0): boolean {
    if (this.entries.has(name)) return false;
    this.entries.set(name, { binding, depth });
    return true;
  }

  get(name: string): Binding | undefined {
    return this.entries.get(name)?.binding;
  }

  /** A fresh scope for one repetition iteration */
  child(): Binder {
    return new Binder();
  }

  /**
   * Fold per-iteration scopes into sequence bindings.
   *
   * @param names - metavariables of the repetition body with their depth inside it
   * @returns the first name that was already bound here, if any
   */
  bindRepetition(names: ReadonlyMap<string, number>, iterations: readonly Binder[]): string | undefined {
    for (const [name, innerDepth] of names) {
      const items: Binding[] = [];
      for (const iteration of iterations) {
        const binding = iteration.get(name);
        if (binding) items.push(binding);
      }
      if (!this.bind(name, { kind: "sequence", items }, innerDepth + 1)) return name;
    }
    return undefined;
  }

  environment(): BindingEnvironment {
    return new BindingEnvironment(new Map(this.entries));
  }
}
