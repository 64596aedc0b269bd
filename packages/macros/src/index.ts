/**
 * @tokenrules/macros
 *
 * Declarative, hygienic `macro_rules`-style expansion over token trees:
 * - Definitions parsed from `macro_rules!` source or matcher/transcriber strings
 * - A scoped, sealable macro registry
 * - Rule selection, fragment capture and repetition binding
 * - Transcription with hygiene marks
 * - An iterative expander with a recursion limit and expansion-chain notes
 */

export type {
  RepetitionQuantifier,
  PatternLiteral,
  PatternMetavariable,
  PatternRepetition,
  PatternGroup,
  PatternNode,
  TemplateLiteral,
  TemplateMetavariableRef,
  TemplateRepetitionEcho,
  TemplateGroup,
  TemplateNode,
  MacroRule,
  MacroDefinition,
  MacroInvocation,
  ExpansionFrame,
  ExpansionResult,
} from "./types.js";
export { isNonEmpty } from "./types.js";

export {
  MacroError,
  MACRO_ERROR_DESCRIPTORS,
  errorKindOf,
  expansionNote,
  withExpansionNotes,
  type MacroErrorKind,
} from "./errors.js";

export { MacroRegistry, type MacroLookup } from "./registry.js";

export { Binder, BindingEnvironment, collectMetavariables, type Binding } from "./bindings.js";

export {
  matchPattern,
  selectRule,
  matchFailureDiagnostic,
  FRAGMENT_DESCRIPTIONS,
  type MatchFailure,
  type MatchFailureKind,
  type MatchOptions,
  type MatchResult,
  type RuleSelection,
} from "./matcher.js";

export { HygieneContext, stampToken } from "./hygiene.js";

export { transcribe, templateReferences, type TranscribeResult } from "./transcribe.js";

export { ExpansionStack, assertRecursionLimit } from "./frames.js";

export {
  MacroExpander,
  unwrapExpansion,
  renderExpansionDiagnostic,
  type MacroExpanderOptions,
  type ExpansionRenderOptions,
} from "./expander.js";

export {
  parseMacroRules,
  parseMacroDefinitions,
  parsePatternNodes,
  parseTemplateNodes,
  defineMacros,
  defineSyntaxMacro,
  type SyntaxMacroOptions,
  type SyntaxMacroSingleArm,
  type SyntaxMacroMultiArm,
} from "./definition.js";
