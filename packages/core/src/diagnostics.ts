/**
 * Diagnostics System for tokenrules
 *
 * Provides compiler-style error messages with:
 * - Structured error codes (TR1001-TR4999)
 * - Rich diagnostics with a primary span, labeled secondary spans and notes
 * - A builder API used by the expansion engine
 *
 * @example
 * ```typescript
 * const diagnostic = new DiagnosticBuilder(TR2001)
 *   .at(invocationSpan)
 *   .withArgs({ macro: "vec", token: "," })
 *   .label(tokenSpan, "no rules expected this token")
 *   .note("in this expansion of `outer!`")
 *   .build();
 *
 * console.error(renderDiagnosticCLI(diagnostic, { source }));
 * ```
 */

import { config } from "./config.js";
import { lineAndColumn, type Span } from "./span.js";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Registry = "registry",
  Definition = "definition",
  Matching = "matching",
  Transcription = "transcription",
  Recursion = "recursion",
  Lexing = "lexing",
}

export type Severity = "error" | "warning" | "info";

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code */
  readonly code: number;

  /** Default severity */
  readonly severity: Severity;

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for docs and --explain */
  readonly explanation: string;
}

// ============================================================================
// Rich Diagnostic Types
// ============================================================================

/**
 * A labeled span pointing at specific code with a message.
 */
export interface LabeledSpan {
  span: Span;
  message: string;
}

export interface RichDiagnostic {
  code: number;
  severity: Severity;
  category: DiagnosticCategory;
  /** Primary message (with placeholders interpolated) */
  message: string;
  primarySpan?: Span;
  labels: LabeledSpan[];
  notes: string[];
  help?: string;
  explanation?: string;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string> = {};

  constructor(private readonly descriptor: DiagnosticDescriptor) {
    this.diagnostic = {
      code: descriptor.code,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      labels: [],
      notes: [],
      explanation: descriptor.explanation,
    };
  }

  /**
   * Set the primary span for this diagnostic.
   */
  at(span: Span | undefined): this {
    if (span) this.diagnostic.primarySpan = span;
    return this;
  }

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Record<string, string | number | undefined>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  label(span: Span, message: string): this {
    this.diagnostic.labels.push({ span, message });
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  private interpolateMessage(): string {
    let message = this.descriptor.messageTemplate;
    for (const [key, value] of Object.entries(this.args)) {
      message = message.split(`{${key}}`).join(value);
    }
    return message;
  }

  build(): RichDiagnostic {
    return { ...this.diagnostic, message: this.interpolateMessage() };
  }
}

// ============================================================================
// Error Catalog: Registry and Definitions (1001-1099)
// ============================================================================

export const TR1001: DiagnosticDescriptor = {
  code: 1001,
  severity: "error",
  category: DiagnosticCategory.Registry,
  messageTemplate: "cannot find macro `{macro}` in this scope",
  explanation: `The invocation names a macro that was never defined in the registry
the expander was built over, or in any of its enclosing scopes.

Define the macro before expansion begins; registries are sealed once an
expander is created.`,
};

export const TR1002: DiagnosticDescriptor = {
  code: 1002,
  severity: "error",
  category: DiagnosticCategory.Registry,
  messageTemplate: "the macro `{macro}` is defined multiple times",
  explanation: `A macro name may be defined only once per registry scope.

To shadow a definition, define the new macro in a child scope:
  const inner = registry.child();
  inner.define("name", definition);`,
};

export const TR1003: DiagnosticDescriptor = {
  code: 1003,
  severity: "error",
  category: DiagnosticCategory.Definition,
  messageTemplate: "invalid macro definition for `{macro}`: {reason}",
  explanation: `A rule is written as a delimited matcher, \`=>\`, and a delimited transcriber:

  ($a:expr, $b:expr) => { $a + $b };

Metavariables in the matcher need a fragment specifier (\`$x:expr\`), and
repetitions end in one of \`*\`, \`+\` or \`?\`.`,
};

// ============================================================================
// Error Catalog: Matching (2001-2099)
// ============================================================================

export const TR2001: DiagnosticDescriptor = {
  code: 2001,
  severity: "error",
  category: DiagnosticCategory.Matching,
  messageTemplate: "no rules of `{macro}` matched this invocation: expected {expected}, found {actual}",
  explanation: `Every rule of the macro was tried in declaration order and none consumed the
whole invocation. The reported position comes from the rule that got furthest.`,
};

export const TR2002: DiagnosticDescriptor = {
  code: 2002,
  severity: "error",
  category: DiagnosticCategory.Matching,
  messageTemplate: "malformed `{fragment}` fragment in invocation of `{macro}`: expected {expected}, found {actual}",
  explanation: `A metavariable started to capture a fragment but the tokens are not a valid
instance of its grammar. Fragment parse errors are final: the remaining rules
are not tried.`,
};

export const TR2003: DiagnosticDescriptor = {
  code: 2003,
  severity: "error",
  category: DiagnosticCategory.Matching,
  messageTemplate: "duplicate matcher binding `${name}` in `{macro}`",
  explanation: `A metavariable name can be bound only once per repetition iteration.
Rename one of the occurrences.`,
};

// ============================================================================
// Error Catalog: Transcription (3001-3099)
// ============================================================================

export const TR3001: DiagnosticDescriptor = {
  code: 3001,
  severity: "error",
  category: DiagnosticCategory.Transcription,
  messageTemplate: "meta-variable `${first}` repeats {firstCount} times, but `${second}` repeats {secondCount} times",
  explanation: `All metavariables repeated together inside one \`$( ... )\` echo must have
been captured the same number of times.`,
};

export const TR3002: DiagnosticDescriptor = {
  code: 3002,
  severity: "error",
  category: DiagnosticCategory.Transcription,
  messageTemplate: "variable `${name}` is still repeating at this depth",
  explanation: `The metavariable was captured inside a repetition, so the transcriber must
reference it inside a matching \`$( ... )\` echo.`,
};

export const TR3003: DiagnosticDescriptor = {
  code: 3003,
  severity: "error",
  category: DiagnosticCategory.Transcription,
  messageTemplate: "attempted to repeat an expression containing no syntax variables matched as repeating at this depth",
  explanation: `A \`$( ... )\` echo is repeated once per captured iteration of the
metavariables it contains. It must contain at least one repeating metavariable.`,
};

export const TR3004: DiagnosticDescriptor = {
  code: 3004,
  severity: "error",
  category: DiagnosticCategory.Transcription,
  messageTemplate: "unknown macro variable `${name}`",
  explanation: `The transcriber references a metavariable that the matched rule never binds.`,
};

// ============================================================================
// Error Catalog: Recursion (4001-4099)
// ============================================================================

export const TR4001: DiagnosticDescriptor = {
  code: 4001,
  severity: "error",
  category: DiagnosticCategory.Recursion,
  messageTemplate: "recursion limit reached while expanding `{macro}` (limit: {limit})",
  explanation: `Nested expansions are tracked on an explicit frame stack. When the stack
holds as many frames as the configured limit, the next expansion fails.

Raise the limit with the \`recursionLimit\` option or
TOKENRULES_EXPANSION_RECURSIONLIMIT, or make the recursion terminate.`,
};

// ============================================================================
// Catalog Lookup
// ============================================================================

export const DIAGNOSTIC_CATALOG: ReadonlyMap<number, DiagnosticDescriptor> = new Map(
  [TR1001, TR1002, TR1003, TR2001, TR2002, TR2003, TR3001, TR3002, TR3003, TR3004, TR4001].map(
    (d) => [d.code, d],
  ),
);

export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

export function getDiagnosticsByCategory(category: DiagnosticCategory): DiagnosticDescriptor[] {
  return [...DIAGNOSTIC_CATALOG.values()].filter((d) => d.category === category);
}

// ============================================================================
// CLI Rendering
// ============================================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

type ColorName = Exclude<keyof typeof COLORS, "reset">;

function colorsEnabled(): boolean {
  const configured = config.get<boolean>("diagnostics.colors");
  if (configured !== undefined) return configured;
  const env = process.env;
  return !env.NO_COLOR && !env.TOKENRULES_NO_COLOR && env.FORCE_COLOR !== "0";
}

function severityColor(severity: Severity): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

function getLineText(source: string, lineNumber: number): string {
  return source.split("\n")[lineNumber - 1] ?? "";
}

function createUnderline(startColumn: number, length: number, char: string): string {
  return " ".repeat(startColumn - 1) + char.repeat(Math.max(1, length));
}

export interface CLIRenderOptions {
  /** Source text the spans point into; without it no snippet is shown */
  source?: string;
  /** File name for the location line when spans carry none */
  fileName?: string;
  /** Whether to use colors (default: auto-detect) */
  colors?: boolean;
  /** Whether to show the catalog explanation (default: false) */
  showExplanation?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

/**
 * Render a RichDiagnostic as a multi-line CLI report.
 *
 * @example Output:
 * ```
 * error[TR2001]: no rules of `vec` matched this invocation: expected expression, found `,`
 *   --> input.rs:1:6
 *    |
 *  1 | vec![,]
 *    |      ^ no rules expected this token
 *    |
 *    = note: in this expansion of `outer!` at input.rs:3:1
 * ```
 */
export function renderDiagnosticCLI(
  diagnostic: RichDiagnostic,
  options: CLIRenderOptions = {},
): string {
  const useColors = options.colors ?? colorsEnabled();
  const paint = (text: string, ...styles: ColorName[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const lines: string[] = [];
  const severityClr = severityColor(diagnostic.severity);
  const { source } = options;

  lines.push(
    `${paint(diagnostic.severity, "bold", severityClr)}${paint(`[TR${diagnostic.code}]`, "bold", severityClr)}: ${paint(diagnostic.message, "bold")}`,
  );

  const primary = diagnostic.primarySpan;
  if (primary) {
    const fileName = primary.file ?? options.fileName ?? "<input>";
    if (source !== undefined) {
      const { line, column } = lineAndColumn(source, primary.start);
      lines.push(`  ${paint("-->", "blue")} ${fileName}:${line}:${column}`);
    } else {
      lines.push(`  ${paint("-->", "blue")} ${fileName}@${primary.start}..${primary.end}`);
    }
  }

  if (primary && source !== undefined) {
    const start = lineAndColumn(source, primary.start);
    const end = lineAndColumn(source, primary.end);
    const gutter = " ".repeat(Math.max(3, String(end.line).length));
    const bar = paint("|", "blue");

    lines.push(` ${gutter} ${bar}`);
    for (let lineNum = start.line; lineNum <= end.line; lineNum++) {
      const lineText = getLineText(source, lineNum);
      lines.push(` ${paint(String(lineNum).padStart(gutter.length, " "), "blue")} ${bar} ${lineText}`);

      const fromCol = lineNum === start.line ? start.column : 1;
      const toCol = lineNum === end.line ? end.column : lineText.length + 1;
      lines.push(` ${gutter} ${bar} ${paint(createUnderline(fromCol, toCol - fromCol, "^"), severityClr)}`);
    }

    for (const label of diagnostic.labels) {
      const labelStart = lineAndColumn(source, label.span.start);
      const labelEnd = lineAndColumn(source, label.span.end);
      const width = labelStart.line === labelEnd.line ? labelEnd.column - labelStart.column : 1;
      lines.push(` ${gutter} ${bar}`);
      lines.push(
        ` ${paint(String(labelStart.line).padStart(gutter.length, " "), "blue")} ${bar} ${getLineText(source, labelStart.line)}`,
      );
      lines.push(
        ` ${gutter} ${bar} ${paint(createUnderline(labelStart.column, width, "-"), "blue")} ${paint(label.message, "blue")}`,
      );
    }

    lines.push(` ${gutter} ${bar}`);
  } else {
    for (const label of diagnostic.labels) {
      lines.push(`   ${paint("= label:", "bold")} ${label.message}`);
    }
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${paint("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${paint("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (options.showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(paint("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Print a RichDiagnostic to the console (stderr).
 */
export function printDiagnostic(diagnostic: RichDiagnostic, options: CLIRenderOptions = {}): void {
  const writer = options.writer ?? ((line: string) => console.error(line));
  writer(renderDiagnosticCLI(diagnostic, options));
}

/**
 * Render multiple diagnostics with a summary.
 */
export function renderDiagnosticsCLI(
  diagnostics: RichDiagnostic[],
  options: CLIRenderOptions = {},
): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const lines: string[] = [];
  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, options));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;

  const parts: string[] = [];
  if (errorCount > 0) parts.push(`${errorCount} error${errorCount > 1 ? "s" : ""}`);
  if (warnCount > 0) parts.push(`${warnCount} warning${warnCount > 1 ? "s" : ""}`);
  if (parts.length > 0) lines.push(`${parts.join(", ")} generated`);

  return lines.join("\n");
}
