import type { Diagnostic } from "../outcome/diagnostic";
import { defaultRegistry, HookRegistry } from "../hooks/registry";
import type { HooksConfig } from "../core/config";
import { createHookExpansionPass } from "./passes/hookExpansion";
import type { LintConfig, LogFn, Pass, PassConfig, PassPhase, PassResult, SourceUnit } from "./types";

const DEFAULT_CONFIG: LintConfig = { passes: {} };
const PHASE_ORDER: readonly PassPhase[] = ["expand", "lint"];

export interface RunResult {
  unit: SourceUnit;
  diagnostics: Diagnostic[];
  passResults: Map<string, PassResult>;
}

export class LintRunner {
  private passes: Pass[] = [];
  private config: LintConfig;
  private registry: HookRegistry;

  constructor(config: Partial<LintConfig> = DEFAULT_CONFIG, registry: HookRegistry = defaultRegistry) {
    this.config = { passes: config.passes ?? {} };
    this.registry = registry;
  }

  register(pass: Pass): void {
    if (this.passes.some(p => p.id === pass.id)) {
      throw new Error(`Pass already registered: ${pass.id}`);
    }
    this.passes.push(pass);
  }

  /**
   * Every enabled pass sees the unit as left by the passes before it.
   * Within a phase, passes run in registration order.
   */
  run(unit: SourceUnit): RunResult {
    let current = unit;
    const diagnostics: Diagnostic[] = [];
    const passResults = new Map<string, PassResult>();

    for (const phase of PHASE_ORDER) {
      for (const pass of this.passes) {
        if (pass.phase !== phase) continue;
        const config = this.getPassConfig(pass.id);
        if (config.enabled === false || config.severityOverride === "off") continue;

        const result = pass.run(current, this.registry);
        passResults.set(pass.id, result);
        diagnostics.push(...applySeverityOverride(result.diagnostics, config.severityOverride));

        if (result.transformed) {
          current = result.transformed;
        }
      }
    }

    return { unit: current, diagnostics, passResults };
  }

  hasErrors(diags: Diagnostic[]): boolean {
    return diags.some(d => d.severity === "error");
  }

  private getPassConfig(passId: string): PassConfig {
    return this.config.passes[passId] ?? { enabled: true };
  }
}

function applySeverityOverride(
  diagnostics: Diagnostic[],
  override: PassConfig["severityOverride"]
): Diagnostic[] {
  if (!override || override === "off") {
    return diagnostics;
  }
  return diagnostics.map(d => ({ ...d, severity: override }));
}

/**
 * Runner with the hook expansion pass registered. Hosts add their own
 * `lint` passes, which then see the expanded forms.
 */
export function createDefaultRunner(
  options: { lint?: Partial<LintConfig>; hooks?: Partial<HooksConfig>; log?: LogFn } = {},
  registry: HookRegistry = defaultRegistry
): LintRunner {
  const runner = new LintRunner(options.lint ?? DEFAULT_CONFIG, registry);
  runner.register(createHookExpansionPass({ config: options.hooks, log: options.log }));
  return runner;
}
