// src/core/config/config.ts
// Configuration for hook resolution and reporting

import * as fs from "fs";
import * as path from "path";
import type { HookRegistry } from "../../hooks/registry";
import { localNameOf, namespaceOf } from "../../hooks/registry";

// =========================================================================
// Configuration Types
// =========================================================================

export type ViolationSeverity = "error" | "warning" | "info";

export type HooksConfig = {
  /** Namespace alias -> full namespace, e.g. { "api": "browser.api" } */
  aliases: Record<string, string>;
  /** Unqualified name -> namespace it is referred from */
  refers: Record<string, string>;
  /** Custom macro -> catalog macro whose hook it borrows */
  lintAs: Record<string, string>;
  /** Fully-qualified macros whose hooks are switched off */
  disabled: string[];
  /** Severity of shape-violation diagnostics */
  violationSeverity: ViolationSeverity;
  /** Log every rewrite through the pass logger */
  trace: boolean;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: HooksConfig = {
  aliases: {},
  refers: {},
  lintAs: {},
  disabled: [],
  violationSeverity: "error",
  trace: false,
};

export const DEFAULT_CONFIG_FILES = [
  "lint-hooks.config.json",
  "lint-hooks.config.yaml",
  "lint-hooks.config.yml",
];

const SEVERITIES: readonly ViolationSeverity[] = ["error", "warning", "info"];

function isSeverity(value: unknown): value is ViolationSeverity {
  return typeof value === "string" && SEVERITIES.some(s => s === value);
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "LINT_HOOKS"): HooksConfig {
  const severity = process.env[`${prefix}_SEVERITY`];
  const trace = process.env[`${prefix}_TRACE`];
  const disabled = process.env[`${prefix}_DISABLED`];

  return {
    ...DEFAULT_CONFIG,
    violationSeverity: isSeverity(severity) ? severity : DEFAULT_CONFIG.violationSeverity,
    trace: trace === "1" || trace === "true",
    disabled: disabled ? splitList(disabled) : [],
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): HooksConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Accepts camelCase or snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): HooksConfig {
  const severity = data.violationSeverity ?? data.violation_severity;
  const disabled = data.disabled;

  return {
    aliases: stringRecord(data.aliases),
    refers: stringRecord(data.refers),
    lintAs: stringRecord(data.lintAs ?? data.lint_as),
    disabled: Array.isArray(disabled)
      ? disabled.filter((d): d is string => typeof d === "string")
      : typeof disabled === "string" ? splitList(disabled) : [],
    violationSeverity: isSeverity(severity) ? severity : DEFAULT_CONFIG.violationSeverity,
    trace: data.trace === true,
  };
}

/**
 * Merge configs with later ones overriding earlier ones. Maps merge key by
 * key; disabled lists accumulate.
 */
export function mergeConfigs(...configs: Partial<HooksConfig>[]): HooksConfig {
  const result: HooksConfig = { ...DEFAULT_CONFIG, disabled: [] };

  for (const cfg of configs) {
    if (cfg.aliases) result.aliases = { ...result.aliases, ...cfg.aliases };
    if (cfg.refers) result.refers = { ...result.refers, ...cfg.refers };
    if (cfg.lintAs) result.lintAs = { ...result.lintAs, ...cfg.lintAs };
    if (cfg.disabled) result.disabled = [...new Set([...result.disabled, ...cfg.disabled])];
    if (cfg.violationSeverity) result.violationSeverity = cfg.violationSeverity;
    if (cfg.trace !== undefined) result.trace = cfg.trace;
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  overrides?: Partial<HooksConfig>;
}): HooksConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Name Resolution
// =========================================================================

/**
 * Resolve a head symbol as written to the catalog name it stands for:
 * alias expansion for qualified names, refers for bare ones, then lint-as.
 */
export function resolveMacroName(name: string, config: HooksConfig): string {
  const ns = namespaceOf(name);
  let resolved = name;

  if (ns !== undefined) {
    const full = lookupOwn(config.aliases, ns);
    if (full !== undefined) resolved = `${full}/${localNameOf(name)}`;
  } else {
    const referredFrom = lookupOwn(config.refers, name);
    if (referredFrom !== undefined) resolved = `${referredFrom}/${name}`;
  }

  return lookupOwn(config.lintAs, resolved) ?? resolved;
}

// Tables come from parsed files; inherited Object.prototype keys are not entries.
function lookupOwn(table: Record<string, string>, key: string): string | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export function isDisabled(name: string, config: HooksConfig): boolean {
  return config.disabled.includes(name);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1].obj;

    // Keys may carry a namespace ("browser.api/with-retry"), so split on ": "
    const colonIdx = trimmed.endsWith(":") ? trimmed.length - 1 : trimmed.indexOf(": ");
    if (colonIdx < 0) continue;

    const key = unquote(trimmed.slice(0, colonIdx).trim());
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value.startsWith("[") && value.endsWith("]")) {
      parent[key] = splitList(value.slice(1, -1)).map(unquote);
    } else {
      parent[key] = unquote(value);
    }
  }

  return result;
}

function unquote(value: string): string {
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

function splitList(value: string): string[] {
  return value.split(",").map(s => s.trim()).filter(s => s.length > 0);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringRecord(value: unknown): Record<string, string> {
  if (!isRecord(value)) return {};
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === "string") out[k] = v;
  }
  return out;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: HooksConfig, registry: HookRegistry): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const [macro, target] of Object.entries(config.lintAs)) {
    if (!registry.has(target)) {
      errors.push(`lintAs ${macro}: ${target} is not a registered hook`);
    }
  }

  for (const name of config.disabled) {
    if (!registry.has(name)) {
      warnings.push(`disabled hook ${name} is not registered`);
    }
  }

  for (const [alias, ns] of Object.entries(config.aliases)) {
    if (alias.includes("/") || ns.includes("/")) {
      errors.push(`alias ${alias} -> ${ns}: namespaces cannot contain '/'`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
