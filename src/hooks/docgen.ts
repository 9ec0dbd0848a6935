import { HookRegistry, localNameOf, namespaceOf } from "./registry";
import type { HookDescriptor } from "./types";

/**
 * Generate markdown documentation from registry, one section per namespace.
 */
export function generateMarkdown(registry: HookRegistry): string {
  const lines: string[] = [];

  lines.push("# Macro Hook Reference\n");
  lines.push(`Total hooks: ${registry.getAll().length}\n`);
  lines.push("---\n");

  const byNamespace = new Map<string, HookDescriptor[]>();
  for (const d of registry.getAll()) {
    const ns = namespaceOf(d.id) ?? "(unqualified)";
    const group = byNamespace.get(ns) ?? [];
    group.push(d);
    byNamespace.set(ns, group);
  }

  for (const [ns, descs] of [...byNamespace].sort(([a], [b]) => a.localeCompare(b))) {
    lines.push(`## ${ns}\n`);
    lines.push("| Macro | Family | Description |");
    lines.push("|-------|--------|-------------|");

    for (const d of [...descs].sort((a, b) => a.id.localeCompare(b.id))) {
      lines.push(`| \`${localNameOf(d.id)}\` | ${d.family} | ${d.doc.summary} |`);
    }

    lines.push("");

    for (const d of descs) {
      for (const ex of d.doc.examples ?? []) {
        lines.push(`- \`${ex.input}\` → \`${ex.output}\``);
      }
    }

    lines.push("");
  }

  return lines.join("\n");
}

/**
 * Generate JSON API reference.
 */
export function generateJSON(registry: HookRegistry): string {
  return JSON.stringify(registry.toJSON(), null, 2);
}
