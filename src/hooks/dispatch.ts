// src/hooks/dispatch.ts
// Invocation -> replacement tree, through the hook registry

import type { ListNode, Node } from "../core/node";
import { isList, isSymbol, withMeta } from "../core/node";
import type { Outcome } from "../outcome/outcome";
import { done, shapeViolated } from "../outcome/constructors";
import { defaultRegistry, HookRegistry } from "./registry";
import type { HookRule } from "./types";

export interface DispatchOptions {
  /** Map the head symbol as written to a registry name (aliases, refers). */
  resolve?: (name: string) => string;
}

/**
 * Head symbol of an invocation, or undefined when the node is not a call.
 */
export function invocationName(node: Node): string | undefined {
  if (!isList(node) || node.children.length === 0) return undefined;
  const head = node.children[0];
  return isSymbol(head) ? head.value : undefined;
}

/**
 * Rewrite one invocation.
 *
 * Unregistered heads and non-invocations come back as the same reference.
 * A replacement carries the invocation's metadata, so it occupies the same
 * source span. Shape violations are returned as Fail, never thrown.
 */
export function dispatch(
  invocation: Node,
  registry: HookRegistry = defaultRegistry,
  options: DispatchOptions = {}
): Outcome<Node> {
  const written = invocationName(invocation);
  if (written === undefined || !isList(invocation)) return done(invocation);

  const name = options.resolve ? options.resolve(written) : written;
  const rule = registry.lookup(name);
  if (!rule) return done(invocation);

  return applyRule(name, invocation, rule);
}

function applyRule(
  macroName: string,
  invocation: ListNode,
  rule: HookRule
): Outcome<Node> {
  const span = invocation.meta?.span;
  const result = rule(invocation);
  if (!result.ok) {
    return shapeViolated({ ...result.violation, macroName }, span);
  }
  return done(withMeta(result.value, invocation.meta), { span, macroName });
}
