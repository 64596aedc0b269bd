/**
 * Macro Expander
 *
 * Drives expansion over a token stream. Every invocation found in the input,
 * and every invocation produced by an expansion, goes through the same entry:
 * check the recursion limit, look the macro up, select a rule, transcribe.
 *
 * The walk is an explicit work-list of levels (the root stream, groups being
 * rebuilt, expansion outputs being rescanned) alongside an explicit frame
 * stack, so nesting depth never turns into host call-stack depth.
 *
 * @example
 * ```typescript
 * const registry = new MacroRegistry();
 * defineMacros(registry, "macro_rules! twice { ($e:expr) => { $e + $e }; }");
 *
 * const expander = new MacroExpander(registry);
 * const result = expander.expandTokens(parseTokenTrees("twice!(a * b)"));
 * if (result.ok) printTokens(result.tokens); // "a*b+a*b"
 * ```
 */

import {
  DEFAULT_RECURSION_LIMIT,
  SYNTHETIC_SPAN,
  config,
  joinSpans,
  renderDiagnosticCLI,
  type RichDiagnostic,
  type Span,
} from "@tokenrules/core";
import { defaultFragmentOracle, type FragmentOracle } from "@tokenrules/fragments";
import { group, isGroup, isPunct, type Delimiter, type TokenTree } from "@tokenrules/tokens";
import { MacroError, notFound, recursionLimitExceeded, withExpansionNotes } from "./errors.js";
import { ExpansionStack, assertRecursionLimit } from "./frames.js";
import { HygieneContext } from "./hygiene.js";
import { matchFailureDiagnostic, selectRule } from "./matcher.js";
import type { MacroRegistry } from "./registry.js";
import { transcribe } from "./transcribe.js";
import type { ExpansionResult, MacroInvocation } from "./types.js";

export interface MacroExpanderOptions {
  /** Maximum nested expansions in flight (default: `expansion.recursionLimit`, 128) */
  recursionLimit?: number;
  /** Only `name!(...)` is an invocation (default: `expansion.requireBang`) */
  requireBang?: boolean;
  /** Grammar oracle for fragment specifiers */
  fragments?: FragmentOracle;
  /** Log each expansion (default: `debug`) */
  verbose?: boolean;
  /** Source of hygiene ids; share one to keep ids distinct across expanders */
  hygiene?: HygieneContext;
}

type Level =
  | { kind: "root"; tokens: readonly TokenTree[]; pos: number; output: TokenTree[] }
  | { kind: "group"; tokens: readonly TokenTree[]; pos: number; output: TokenTree[]; delimiter: Delimiter; span: Span }
  | { kind: "expansion"; tokens: readonly TokenTree[]; pos: number; output: TokenTree[] };

type Detected =
  | { kind: "none" }
  | { kind: "invocation"; invocation: MacroInvocation; next: number }
  | { kind: "error"; diagnostic: RichDiagnostic };

type Entered =
  | { ok: true; tokens: TokenTree[] }
  /** `ownFrame` when the failing invocation's frame is already on the stack */
  | { ok: false; diagnostic: RichDiagnostic; ownFrame: boolean };

export class MacroExpander {
  readonly recursionLimit: number;
  readonly requireBang: boolean;
  private readonly fragments: FragmentOracle;
  private readonly verbose: boolean;
  private readonly hygiene: HygieneContext;

  /**
   * Seals `registry`; definitions cannot change while it backs an expander.
   *
   * @throws RangeError if `recursionLimit` is not a positive integer
   */
  constructor(
    private readonly registry: MacroRegistry,
    options: MacroExpanderOptions = {},
  ) {
    this.recursionLimit =
      options.recursionLimit ?? config.get<number>("expansion.recursionLimit", DEFAULT_RECURSION_LIMIT);
    assertRecursionLimit(this.recursionLimit);
    this.requireBang = options.requireBang ?? config.get<boolean>("expansion.requireBang", false);
    this.fragments = options.fragments ?? defaultFragmentOracle;
    this.verbose = options.verbose ?? config.isDebugEnabled();
    this.hygiene = options.hygiene ?? new HygieneContext();
    registry.seal();
  }

  /** Expand one invocation, then everything its output invokes. */
  expandInvocation(invocation: MacroInvocation): ExpansionResult {
    const stack = new ExpansionStack(this.recursionLimit);
    const entered = this.enter(invocation, stack);
    if (!entered.ok) return this.failure(entered, stack);
    return this.drive(
      [
        { kind: "root", tokens: [], pos: 0, output: [] },
        { kind: "expansion", tokens: entered.tokens, pos: 0, output: [] },
      ],
      stack,
    );
  }

  /** Expand every invocation in a token stream. */
  expandTokens(tokens: readonly TokenTree[]): ExpansionResult {
    const stack = new ExpansionStack(this.recursionLimit);
    return this.drive([{ kind: "root", tokens, pos: 0, output: [] }], stack);
  }

  private drive(work: Level[], stack: ExpansionStack): ExpansionResult {
    for (;;) {
      const level = work[work.length - 1];

      if (level.pos >= level.tokens.length) {
        work.pop();
        const parent = work[work.length - 1];
        if (level.kind === "root" || !parent) return { ok: true, tokens: level.output };
        if (level.kind === "group") {
          parent.output.push(group(level.delimiter, level.output, level.span));
        } else {
          for (const token of level.output) parent.output.push(token);
          stack.pop();
        }
        continue;
      }

      const detected = this.detect(level.tokens, level.pos);
      if (detected.kind === "error") {
        return this.failure({ ok: false, diagnostic: detected.diagnostic, ownFrame: false }, stack);
      }
      if (detected.kind === "invocation") {
        level.pos = detected.next;
        const entered = this.enter(detected.invocation, stack);
        if (!entered.ok) return this.failure(entered, stack);
        work.push({ kind: "expansion", tokens: entered.tokens, pos: 0, output: [] });
        continue;
      }

      const token = level.tokens[level.pos];
      level.pos++;
      if (token.kind === "group") {
        work.push({
          kind: "group",
          tokens: token.tokens,
          pos: 0,
          output: [],
          delimiter: token.delimiter,
          span: token.span,
        });
      } else {
        level.output.push(token);
      }
    }
  }

  /**
   * An identifier naming a macro, an optional `!`, then a delimited group.
   * `name!(...)` always counts as an invocation; a bare `name(...)` only
   * when `name` is registered and `requireBang` is off.
   */
  private detect(tokens: readonly TokenTree[], pos: number): Detected {
    const head = tokens[pos];
    if (head?.kind !== "ident") return { kind: "none" };

    const bang = isPunct(tokens[pos + 1], "!");
    const args = tokens[bang ? pos + 2 : pos + 1];
    if (!isGroup(args)) return { kind: "none" };

    const span = joinSpans(head.span, args.span);
    if (!bang && (this.requireBang || !this.registry.has(head.text))) return { kind: "none" };
    if (bang && !this.registry.has(head.text)) {
      return { kind: "error", diagnostic: notFound(head.text, span) };
    }

    return {
      kind: "invocation",
      invocation: { name: head.text, args: args.tokens, span },
      next: bang ? pos + 3 : pos + 2,
    };
  }

  private enter(invocation: MacroInvocation, stack: ExpansionStack): Entered {
    const { name, args } = invocation;
    const span = invocation.span ?? args[0]?.span;

    if (stack.isFull) {
      return { ok: false, diagnostic: recursionLimitExceeded(name, stack.limit, span), ownFrame: false };
    }

    const found = this.registry.lookup(name, span);
    if (!found.ok) return { ok: false, diagnostic: found.diagnostic, ownFrame: false };

    stack.push({ macroName: name, span: span ?? SYNTHETIC_SPAN, ruleIndex: null });

    const selection = selectRule(found.definition, args, { fragments: this.fragments, span });
    if (!selection.ok) {
      return { ok: false, diagnostic: matchFailureDiagnostic(name, selection.failure, span), ownFrame: true };
    }
    stack.selectRule(selection.ruleIndex);

    const id = this.hygiene.newContext(name);
    const result = transcribe(selection.rule.template, selection.bindings, id);
    if (!result.ok) return { ok: false, diagnostic: result.diagnostic, ownFrame: true };

    if (this.verbose) {
      console.log(
        `[tokenrules:expand] ${name}! matched rule #${selection.ruleIndex} at depth ${stack.depth} (${id.toString()})`,
      );
    }
    return { ok: true, tokens: result.tokens };
  }

  /**
   * Attach the frame chain. Notes name the enclosing expansions; a failure
   * inside an invocation's own rule selection or transcription does not
   * repeat that invocation as a note.
   */
  private failure(failed: Extract<Entered, { ok: false }>, stack: ExpansionStack): ExpansionResult {
    const chain = stack.chain();
    const enclosing = failed.ownFrame ? chain.slice(0, -1) : chain;
    if (this.verbose) {
      console.log(`[tokenrules:expand] failed with TR${failed.diagnostic.code} at depth ${chain.length}`);
    }
    return { ok: false, diagnostic: withExpansionNotes(failed.diagnostic, enclosing), chain };
  }
}

/**
 * @throws MacroError carrying the failure's diagnostic
 */
export function unwrapExpansion(result: ExpansionResult): TokenTree[] {
  if (result.ok) return result.tokens;
  throw new MacroError(result.diagnostic);
}

export interface ExpansionRenderOptions {
  source?: string;
  fileName?: string;
  colors?: boolean;
}

/** Multi-line compiler-style report for an expansion failure. */
export function renderExpansionDiagnostic(
  diagnostic: RichDiagnostic,
  options: ExpansionRenderOptions = {},
): string {
  return renderDiagnosticCLI(diagnostic, options);
}
