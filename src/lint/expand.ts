import type { Node } from "../core/node";
import { readForms, ReaderError } from "../core/reader";
import type { HooksConfig } from "../core/config";
import { defaultRegistry, HookRegistry } from "../hooks/registry";
import { createDefaultRunner, type RunResult } from "./runner";
import type { LintConfig, LogFn } from "./types";

export interface ExpandSourceOptions {
  file?: string;
  hooks?: Partial<HooksConfig>;
  lint?: Partial<LintConfig>;
  log?: LogFn;
  registry?: HookRegistry;
}

/**
 * Read a source text and expand every hooked macro call in it.
 * Reader errors come back as a single diagnostic with no forms.
 */
export function expandSource(src: string, options: ExpandSourceOptions = {}): RunResult {
  let forms: Node[];
  try {
    forms = readForms(src, options.file);
  } catch (e) {
    if (e instanceof ReaderError) {
      return { unit: { file: options.file, forms: [] }, diagnostics: [e.diagnostic], passResults: new Map() };
    }
    throw e;
  }

  const runner = createDefaultRunner(
    { lint: options.lint, hooks: options.hooks, log: options.log },
    options.registry ?? defaultRegistry
  );
  return runner.run({ file: options.file, forms });
}
