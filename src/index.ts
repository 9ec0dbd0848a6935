// src/index.ts
// lint-hooks - Public API
//
// Rewrites calls to domain macros into let/do/fn/def forms a generic linter
// already understands.

// ═══════════════════════════════════════════════════════════════════════════════
// NODE MODEL & READER
// ═══════════════════════════════════════════════════════════════════════════════

export type { Node, NodeMeta, Span, TokenValue, MapPair, ListNode, VectorNode } from "./core/node";
export { token, numeral, str, list, vector, map, withMeta, nodeEq, nodeToString, isSymbol } from "./core/node";
export { readForm, readForms, ReaderError } from "./core/reader";

// ═══════════════════════════════════════════════════════════════════════════════
// HOOKS
// ═══════════════════════════════════════════════════════════════════════════════

export type { HookRule, HookFamily, HookDescriptor, HookDoc } from "./hooks/types";
export type { ShapeViolation, ShapeResult, BindingSpec, BindingPair } from "./hooks/shape";
export { matchBindingVector, isVectorShaped, isStringLiteral } from "./hooks/shape";
export {
  synthesizeBinding,
  synthesizeSequence,
  synthesizeFunctionLiteral,
  synthesizeDeclaration,
} from "./hooks/synth";
export { HookRegistry, defaultRegistry, CATALOG } from "./hooks/registry";
export { dispatch, invocationName, type DispatchOptions } from "./hooks/dispatch";
export { RULES, HOOK_FAMILIES } from "./hooks/rules";
export { generateMarkdown, generateJSON } from "./hooks/docgen";

// ═══════════════════════════════════════════════════════════════════════════════
// HOST ADAPTER
// ═══════════════════════════════════════════════════════════════════════════════

export type { SourceUnit, Pass, PassResult, LintConfig, LogFn } from "./lint/types";
export { LintRunner, createDefaultRunner, type RunResult } from "./lint/runner";
export { createHookExpansionPass, HOOK_EXPANSION_PASS_ID } from "./lint/passes/hookExpansion";
export { expandSource, type ExpandSourceOptions } from "./lint/expand";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export type { HooksConfig, ViolationSeverity } from "./core/config";
export { loadConfig, mergeConfigs, validateConfig, resolveMacroName } from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export type { Outcome, Done, Fail } from "./outcome/outcome";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export type { Failure, FailureReason } from "./outcome/failure";
export { isDone, isFail } from "./outcome/outcome";
export { DIAGNOSTIC_CODES } from "./outcome/codes";
