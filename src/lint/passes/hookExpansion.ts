import type { ListNode, Node } from "../../core/node";
import { isList, list, map, vector } from "../../core/node";
import type { HooksConfig } from "../../core/config";
import { isDisabled, mergeConfigs, resolveMacroName } from "../../core/config";
import { dispatch, invocationName } from "../../hooks/dispatch";
import type { HookRegistry } from "../../hooks/registry";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import type { LogFn, Pass, PassResult, SourceUnit } from "../types";

export const HOOK_EXPANSION_PASS_ID = "hooks/expand";

export interface HookExpansionOptions {
  config?: Partial<HooksConfig>;
  log?: LogFn;
}

const noop: LogFn = () => undefined;

/**
 * Replaces every recognized macro invocation with its core-form rewrite and
 * keeps walking into the replacement. A malformed invocation is left as
 * written and reported once; the rest of the unit is still expanded.
 */
export function createHookExpansionPass(options: HookExpansionOptions = {}): Pass {
  const config = mergeConfigs(options.config ?? {});
  const log = options.log ?? (config.trace ? console.log : noop);

  return {
    id: HOOK_EXPANSION_PASS_ID,
    name: "Macro hook expansion",
    phase: "expand",
    run(unit: SourceUnit, registry: HookRegistry): PassResult {
      const diagnostics: Diagnostic[] = [];
      let rewritten = 0;
      let violations = 0;

      for (const [macro, target] of Object.entries(config.lintAs)) {
        if (!registry.has(target)) {
          diagnostics.push(makeDiagnostic("H0002", { target, macro }));
        }
      }

      const resolve = (name: string) => resolveMacroName(name, config);

      const rewrite = (node: ListNode): Node | undefined => {
        const written = invocationName(node);
        if (written === undefined) return undefined;

        const name = resolve(written);
        if (isDisabled(name, config)) {
          diagnostics.push(makeDiagnostic("W0101", { macro: name }, node.meta?.span));
          log("Hook disabled", { macro: name, span: node.meta?.span });
          return undefined;
        }

        const outcome = dispatch(node, registry, { resolve });
        if (outcome.tag === "Fail") {
          violations++;
          for (const d of outcome.failure.diagnostics) {
            diagnostics.push({ ...d, severity: config.violationSeverity });
          }
          log("Hook shape violation", { macro: name, message: outcome.failure.message });
          return undefined;
        }

        if (outcome.value === node) return undefined;
        rewritten++;
        log("Hook rewrite", { macro: name, span: outcome.meta.span });
        return outcome.value;
      };

      // Rewrites reuse argument nodes (with-page-api binds pg to pg), so one
      // node can sit at several places in a replacement. Each is expanded once.
      const expanded = new Map<Node, Node>();

      const expand = (node: Node): Node => {
        const cached = expanded.get(node);
        if (cached !== undefined) return cached;

        let result: Node;
        if (isList(node)) {
          const replaced = rewrite(node);
          result = descend(replaced ?? node);
        } else {
          result = descend(node);
        }
        expanded.set(node, result);
        return result;
      };

      const descend = (node: Node): Node => {
        switch (node.tag) {
          case "Token":
          case "Str":
            return node;
          case "List": {
            const children = expandAll(node.children);
            return children === node.children ? node : list(children, node.meta);
          }
          case "Vector": {
            const children = expandAll(node.children);
            return children === node.children ? node : vector(children, node.meta);
          }
          case "Map": {
            let changed = false;
            const pairs = node.pairs.map(([k, v]) => {
              const k2 = expand(k);
              const v2 = expand(v);
              if (k2 !== k || v2 !== v) changed = true;
              return [k2, v2] as const;
            });
            return changed ? map(pairs, node.meta) : node;
          }
        }
      };

      // Same array back when nothing below changed, so untouched subtrees keep identity
      const expandAll = (nodes: readonly Node[]): readonly Node[] => {
        let changed = false;
        const out = nodes.map(n => {
          const e = expand(n);
          if (e !== n) changed = true;
          return e;
        });
        return changed ? out : nodes;
      };

      const forms = expandAll(unit.forms);

      return {
        diagnostics,
        transformed: forms === unit.forms ? undefined : { ...unit, forms },
        metadata: { rewritten, violations },
      };
    },
  };
}
