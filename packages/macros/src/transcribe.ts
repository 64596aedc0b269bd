/**
 * Transcriber
 *
 * Instantiates a rule's template against the bindings of a successful match.
 * Template tokens are stamped with the expansion's hygiene id; tokens that
 * come from bindings are copied as they were captured.
 *
 * Inside a `$( ... )` echo, metavariables bound at a deeper repetition depth
 * than the current echo nesting drive the iteration count. They must all have
 * been captured the same number of times.
 */

import type { RichDiagnostic } from "@tokenrules/core";
import { group, type HygieneId, type TokenTree } from "@tokenrules/tokens";
import type { Binding, BindingEnvironment } from "./bindings.js";
import {
  repetitionCountMismatch,
  repetitionWithoutMetavariable,
  stillRepeating,
  unboundMetavariable,
} from "./errors.js";
import { stampToken } from "./hygiene.js";
import type { TemplateNode, TemplateRepetitionEcho } from "./types.js";

export type TranscribeResult = { ok: true; tokens: TokenTree[] } | { ok: false; diagnostic: RichDiagnostic };

type Emit = { ok: true } | { ok: false; diagnostic: RichDiagnostic };

const OK: Emit = { ok: true };

/**
 * Metavariable names referenced anywhere in `nodes`, in first-use order.
 */
export function templateReferences(nodes: readonly TemplateNode[]): string[] {
  const names = new Set<string>();
  const visit = (list: readonly TemplateNode[]): void => {
    for (const node of list) {
      switch (node.kind) {
        case "metavariable-ref":
          names.add(node.name);
          break;
        case "repetition-echo":
        case "group":
          visit(node.kind === "group" ? node.inner : node.body);
          break;
        case "literal":
          break;
      }
    }
  };
  visit(nodes);
  return [...names];
}

function firstUnbound(nodes: readonly TemplateNode[], env: BindingEnvironment): RichDiagnostic | undefined {
  for (const node of nodes) {
    switch (node.kind) {
      case "metavariable-ref":
        if (!env.has(node.name)) return unboundMetavariable(node.name, node.span);
        break;
      case "repetition-echo": {
        const found = firstUnbound(node.body, env);
        if (found) return found;
        break;
      }
      case "group": {
        const found = firstUnbound(node.inner, env);
        if (found) return found;
        break;
      }
      case "literal":
        break;
    }
  }
  return undefined;
}

/** Follow the echo indices down `levels` repetition levels. */
function descend(binding: Binding | undefined, indices: readonly number[], levels: number): Binding | undefined {
  let current = binding;
  for (let level = 0; level < levels && current; level++) {
    current = current.kind === "sequence" ? current.items[indices[level]] : current;
  }
  return current;
}

class Transcriber {
  private readonly output: TokenTree[][] = [[]];

  constructor(
    private readonly env: BindingEnvironment,
    private readonly id: HygieneId,
  ) {}

  run(nodes: readonly TemplateNode[]): TranscribeResult {
    const result = this.emitAll(nodes, []);
    if (!result.ok) return result;
    return { ok: true, tokens: this.current() };
  }

  private current(): TokenTree[] {
    return this.output[this.output.length - 1];
  }

  private emitAll(nodes: readonly TemplateNode[], indices: readonly number[]): Emit {
    for (const node of nodes) {
      const result = this.emit(node, indices);
      if (!result.ok) return result;
    }
    return OK;
  }

  private emit(node: TemplateNode, indices: readonly number[]): Emit {
    switch (node.kind) {
      case "literal":
        this.current().push(stampToken(node.token, this.id));
        return OK;

      case "metavariable-ref": {
        const depth = this.env.depthOf(node.name) ?? 0;
        const binding = descend(this.env.get(node.name), indices, Math.min(depth, indices.length));
        if (!binding) return { ok: false, diagnostic: unboundMetavariable(node.name, node.span) };
        if (binding.kind === "sequence") return { ok: false, diagnostic: stillRepeating(node.name, node.span) };
        this.current().push(...binding.tokens.toArray());
        return OK;
      }

      case "group": {
        this.output.push([]);
        const result = this.emitAll(node.inner, indices);
        const inner = this.output.pop() ?? [];
        if (!result.ok) return result;
        this.current().push(group(node.delimiter, inner, node.span));
        return OK;
      }

      case "repetition-echo":
        return this.emitEcho(node, indices);
    }
  }

  private emitEcho(node: TemplateRepetitionEcho, indices: readonly number[]): Emit {
    const depth = indices.length;
    let governing: { name: string; count: number } | undefined;

    for (const name of templateReferences(node.body)) {
      if ((this.env.depthOf(name) ?? 0) <= depth) continue;
      const binding = descend(this.env.get(name), indices, depth);
      if (binding?.kind !== "sequence") continue;
      const count = binding.items.length;
      if (!governing) {
        governing = { name, count };
      } else if (count !== governing.count) {
        return { ok: false, diagnostic: repetitionCountMismatch(governing, { name, count }, node.span) };
      }
    }

    if (!governing) return { ok: false, diagnostic: repetitionWithoutMetavariable(node.span) };

    for (let i = 0; i < governing.count; i++) {
      if (i > 0 && node.separator) this.current().push(stampToken(node.separator, this.id));
      const result = this.emitAll(node.body, [...indices, i]);
      if (!result.ok) return result;
    }
    return OK;
  }
}

/**
 * Instantiate `template` with the captures in `env`.
 */
export function transcribe(
  template: readonly TemplateNode[],
  env: BindingEnvironment,
  hygieneId: HygieneId,
): TranscribeResult {
  const unbound = firstUnbound(template, env);
  if (unbound) return { ok: false, diagnostic: unbound };
  return new Transcriber(env, hygieneId).run(template);
}
