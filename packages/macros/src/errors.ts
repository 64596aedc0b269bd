/**
 * Macro errors and diagnostic constructors
 *
 * Every failure the engine can report maps to one catalog entry in
 * @tokenrules/core. Entry points return these diagnostics in typed results;
 * throwing helpers wrap them in MacroError.
 */

import {
  DiagnosticBuilder,
  TR1001,
  TR1002,
  TR1003,
  TR2001,
  TR2002,
  TR2003,
  TR3001,
  TR3002,
  TR3003,
  TR3004,
  TR4001,
  type DiagnosticDescriptor,
  type RichDiagnostic,
  type Span,
} from "@tokenrules/core";
import type { ExpansionFrame } from "./types.js";

export type MacroErrorKind =
  | "NotFound"
  | "DuplicateDefinition"
  | "InvalidMacroDefinition"
  | "NoMatchingRule"
  | "MalformedFragment"
  | "DuplicateMetavariableBinding"
  | "RepetitionCountMismatch"
  | "MetavariableStillRepeating"
  | "RepetitionWithoutMetavariable"
  | "UnboundMetavariable"
  | "RecursionLimitExceeded";

export const MACRO_ERROR_DESCRIPTORS: Readonly<Record<MacroErrorKind, DiagnosticDescriptor>> = {
  NotFound: TR1001,
  DuplicateDefinition: TR1002,
  InvalidMacroDefinition: TR1003,
  NoMatchingRule: TR2001,
  MalformedFragment: TR2002,
  DuplicateMetavariableBinding: TR2003,
  RepetitionCountMismatch: TR3001,
  MetavariableStillRepeating: TR3002,
  RepetitionWithoutMetavariable: TR3003,
  UnboundMetavariable: TR3004,
  RecursionLimitExceeded: TR4001,
};

export function errorKindOf(diagnostic: RichDiagnostic): MacroErrorKind | undefined {
  for (const [kind, descriptor] of Object.entries(MACRO_ERROR_DESCRIPTORS)) {
    if (descriptor.code === diagnostic.code && isMacroErrorKind(kind)) return kind;
  }
  return undefined;
}

function isMacroErrorKind(kind: string): kind is MacroErrorKind {
  return kind in MACRO_ERROR_DESCRIPTORS;
}

export class MacroError extends Error {
  readonly diagnostic: RichDiagnostic;

  constructor(diagnostic: RichDiagnostic) {
    super(`TR${diagnostic.code}: ${diagnostic.message}`);
    this.name = "MacroError";
    this.diagnostic = diagnostic;
  }

  get code(): number {
    return this.diagnostic.code;
  }

  get kind(): MacroErrorKind | undefined {
    return errorKindOf(this.diagnostic);
  }
}

// =============================================================================
// Constructors
// =============================================================================

export function expansionNote(frame: ExpansionFrame): string {
  return `in this expansion of \`${frame.macroName}!\``;
}

/** Adds one note per enclosing expansion, oldest first. */
export function withExpansionNotes(diagnostic: RichDiagnostic, frames: readonly ExpansionFrame[]): RichDiagnostic {
  if (frames.length === 0) return diagnostic;
  return { ...diagnostic, notes: [...diagnostic.notes, ...frames.map(expansionNote)] };
}

export function notFound(name: string, span?: Span): RichDiagnostic {
  return new DiagnosticBuilder(TR1001)
    .at(span)
    .withArgs({ macro: name })
    .help(`define \`${name}\` with \`macro_rules!\` before it is used`)
    .build();
}

export function duplicateDefinition(name: string, span?: Span): RichDiagnostic {
  return new DiagnosticBuilder(TR1002).at(span).withArgs({ macro: name }).build();
}

export function invalidDefinition(name: string, reason: string, span?: Span): RichDiagnostic {
  return new DiagnosticBuilder(TR1003).at(span).withArgs({ macro: name, reason }).build();
}

export function duplicateBinding(macroName: string, variable: string, span?: Span): RichDiagnostic {
  return new DiagnosticBuilder(TR2003).at(span).withArgs({ macro: macroName, name: variable }).build();
}

export function repetitionCountMismatch(
  first: { name: string; count: number },
  second: { name: string; count: number },
  span?: Span,
): RichDiagnostic {
  return new DiagnosticBuilder(TR3001)
    .at(span)
    .withArgs({
      first: first.name,
      firstCount: first.count,
      second: second.name,
      secondCount: second.count,
    })
    .build();
}

export function stillRepeating(variable: string, span?: Span): RichDiagnostic {
  return new DiagnosticBuilder(TR3002).at(span).withArgs({ name: variable }).build();
}

export function repetitionWithoutMetavariable(span?: Span): RichDiagnostic {
  return new DiagnosticBuilder(TR3003).at(span).build();
}

export function unboundMetavariable(variable: string, span?: Span): RichDiagnostic {
  return new DiagnosticBuilder(TR3004).at(span).withArgs({ name: variable }).build();
}

export function recursionLimitExceeded(name: string, limit: number, span?: Span): RichDiagnostic {
  return new DiagnosticBuilder(TR4001)
    .at(span)
    .withArgs({ macro: name, limit })
    .help("consider raising `expansion.recursionLimit` or removing the unbounded recursion")
    .build();
}
