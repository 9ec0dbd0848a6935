// src/hooks/shape.ts
// Argument-shape extraction for hook rules: binding vectors, doc strings, config slots

import type { Node, ListNode, StrNode, VectorNode } from "../core/node";
import { isStr, isVector } from "../core/node";
import { nilPlaceholder } from "./synth";

export interface ShapeViolation {
  /** Filled in by the dispatcher; rules are shared across macros. */
  macroName?: string;
  expected: string;
  received: string;
}

export type ShapeResult<T> =
  | { ok: true; value: T }
  | { ok: false; violation: ShapeViolation };

export interface BindingPair {
  /** Binding target; usually a symbol, destructuring forms are kept as-is. */
  target: Node;
  init: Node;
}

export type BindingSpec = BindingPair[];

export function isVectorShaped(node: Node | undefined): node is VectorNode {
  return node !== undefined && isVector(node);
}

export function isStringLiteral(node: Node | undefined): node is StrNode {
  return node !== undefined && isStr(node);
}

export function argumentsOf(invocation: ListNode): readonly Node[] {
  return invocation.children.slice(1);
}

export function describeShape(node: Node | undefined): string {
  if (node === undefined) return "no argument";
  switch (node.tag) {
    case "Token": return node.value === null ? "nil" : `token ${String(node.value)}`;
    case "Str": return "string";
    case "List": return "list";
    case "Vector": return `vector of ${node.children.length}`;
    case "Map": return "map";
  }
}

export function violation<T>(expected: string, received: string): ShapeResult<T> {
  return { ok: false, violation: { expected, received } };
}

/**
 * Pair up a binding vector's children in order. A trailing unpaired target
 * is bound to the nil placeholder, so `[sym]` and `[sym expr]` produce the
 * same shape.
 */
export function matchBindingVector(
  node: Node | undefined,
  minArity: number,
  maxArity: number
): ShapeResult<BindingSpec> {
  if (!isVectorShaped(node)) {
    return violation(expectedVector(minArity, maxArity), describeShape(node));
  }

  const children = node.children;
  if (children.length < minArity || children.length > maxArity) {
    return violation(expectedVector(minArity, maxArity), describeShape(node));
  }

  const pairs: BindingSpec = [];
  for (let i = 0; i < children.length; i += 2) {
    const init = i + 1 < children.length ? children[i + 1] : nilPlaceholder();
    pairs.push({ target: children[i], init });
  }
  return { ok: true, value: pairs };
}

function expectedVector(minArity: number, maxArity: number): string {
  if (minArity === maxArity) {
    return `a binding vector of ${minArity}`;
  }
  if (maxArity === Infinity) {
    return minArity === 0 ? "a binding vector" : `a binding vector of at least ${minArity}`;
  }
  return `a binding vector of ${minArity} to ${maxArity}`;
}
