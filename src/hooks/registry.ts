import type { HookDescriptor, HookFamily, HookRule } from "./types";
import { RULES, isHookFamily } from "./rules";
import { coreDescriptors } from "./descriptors/core";
import { apiDescriptors } from "./descriptors/api";
import { reportDescriptors } from "./descriptors/report";

/**
 * Macro name -> hook rule table. Filled during startup, then sealed;
 * a sealed registry is read-only and safe to share.
 */
export class HookRegistry {
  private rules: Map<string, HookRule> = new Map();
  private descriptors: Map<string, HookDescriptor> = new Map();
  private byFamily: Map<HookFamily, Set<string>> = new Map();
  private sealed = false;

  /**
   * Register a rule under a fully-qualified macro name. Throws on duplicates
   * and once sealed.
   */
  register(name: string, rule: HookRule): void {
    this.assertWritable(name);
    if (this.rules.has(name)) {
      throw new Error(`Hook already registered: ${name}`);
    }
    this.rules.set(name, rule);
  }

  /**
   * Register a catalog descriptor; its rule comes from its family.
   */
  registerDescriptor(descriptor: HookDescriptor): void {
    if (!isHookFamily(descriptor.family)) {
      throw new Error(`Unknown hook family for ${descriptor.id}: ${String(descriptor.family)}`);
    }
    this.register(descriptor.id, RULES[descriptor.family]);
    this.descriptors.set(descriptor.id, descriptor);

    let ids = this.byFamily.get(descriptor.family);
    if (!ids) {
      ids = new Set();
      this.byFamily.set(descriptor.family, ids);
    }
    ids.add(descriptor.id);
  }

  lookup(name: string): HookRule | undefined {
    return this.rules.get(name);
  }

  has(name: string): boolean {
    return this.rules.has(name);
  }

  getDescriptor(name: string): HookDescriptor | undefined {
    return this.descriptors.get(name);
  }

  /**
   * Names of every registered hook, descriptor-backed or not.
   */
  names(): string[] {
    return Array.from(this.rules.keys());
  }

  getAll(): HookDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  getByFamily(family: HookFamily): HookDescriptor[] {
    const ids = this.byFamily.get(family);
    if (!ids) return [];
    return this.getAll().filter(d => ids.has(d.id));
  }

  /**
   * Query by macro namespace ("browser.api").
   */
  getByNamespace(namespace: string): HookDescriptor[] {
    return this.getAll().filter(d => namespaceOf(d.id) === namespace);
  }

  /**
   * Simple text search (id, summary, detail).
   */
  search(query: string): HookDescriptor[] {
    const q = query.toLowerCase();
    return this.getAll().filter(d =>
      d.id.toLowerCase().includes(q) ||
      d.doc.summary.toLowerCase().includes(q) ||
      (d.doc.detail?.toLowerCase().includes(q) ?? false)
    );
  }

  /**
   * Validate descriptors for required fields and qualified names.
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (const desc of this.descriptors.values()) {
      if (namespaceOf(desc.id) === undefined) {
        errors.push(`${desc.id}: id must be namespace-qualified`);
      }
      if (!desc.doc.summary) {
        errors.push(`${desc.id}: missing doc.summary`);
      }
    }

    return { valid: errors.length === 0, errors };
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  toJSON(): Record<string, HookDescriptor> {
    return Object.fromEntries(this.descriptors);
  }

  static fromDescriptors(descriptors: Iterable<HookDescriptor>): HookRegistry {
    const registry = new HookRegistry();
    for (const desc of descriptors) {
      registry.registerDescriptor(desc);
    }
    return registry;
  }

  private assertWritable(name: string): void {
    if (this.sealed) {
      throw new Error(`Hook registry is sealed; cannot register ${name}`);
    }
  }
}

/**
 * "ns/name" -> "ns"; undefined for unqualified names and the bare "/" symbol.
 */
export function namespaceOf(name: string): string | undefined {
  const idx = name.indexOf("/");
  if (idx <= 0 || idx === name.length - 1) return undefined;
  return name.slice(0, idx);
}

/**
 * "ns/name" -> "name"
 */
export function localNameOf(name: string): string {
  return namespaceOf(name) === undefined ? name : name.slice(name.indexOf("/") + 1);
}

export const CATALOG: readonly HookDescriptor[] = [
  ...coreDescriptors,
  ...apiDescriptors,
  ...reportDescriptors,
];

export const defaultRegistry = HookRegistry.fromDescriptors(CATALOG).seal();
