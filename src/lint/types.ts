import type { Node } from "../core/node";
import type { Diagnostic } from "../outcome/diagnostic";
import type { HookRegistry } from "../hooks/registry";

/** One analyzed source file: its top-level forms as the host parsed them. */
export interface SourceUnit {
  file?: string;
  forms: readonly Node[];
}

export type LogFn = (msg: string, data?: unknown) => void;

export interface PassResult {
  diagnostics: Diagnostic[];
  transformed?: SourceUnit;
  metadata?: Record<string, unknown>;
}

/** `expand` rewrites hooked macro calls; `lint` passes analyze the result. */
export type PassPhase = "expand" | "lint";

export interface Pass {
  id: string;
  name: string;
  phase: PassPhase;
  run(unit: SourceUnit, registry: HookRegistry): PassResult;
}

export interface PassConfig {
  enabled: boolean;
  severityOverride?: "error" | "warning" | "info" | "off";
}

export interface LintConfig {
  passes: Record<string, PassConfig>;
}
