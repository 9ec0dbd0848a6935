// src/hooks/synth.ts
// Canonical replacement constructs: let, do, fn, def

import type { Node, ListNode } from "../core/node";
import { token, list, vector, map } from "../core/node";
import type { BindingSpec } from "./shape";

export function nilPlaceholder(): Node {
  return token(null);
}

export function anonymousSymbol(): Node {
  return token("_");
}

export function emptyMapPlaceholder(): Node {
  return map([]);
}

/** (let [t1 e1 t2 e2 ...] body...) */
export function synthesizeBinding(pairs: BindingSpec, body: readonly Node[]): ListNode {
  const flat: Node[] = [];
  for (const { target, init } of pairs) flat.push(target, init);
  return list([token("let"), vector(flat), ...body]);
}

/** (do children...) */
export function synthesizeSequence(children: readonly Node[]): ListNode {
  return list([token("do"), ...children]);
}

/** (fn params body...); params is reused, not rebuilt */
export function synthesizeFunctionLiteral(params: Node, body: readonly Node[]): ListNode {
  return list([token("fn"), params, ...body]);
}

/** (do (def name nil) body...) */
export function synthesizeDeclaration(name: Node, body: readonly Node[]): ListNode {
  const def = list([token("def"), name, nilPlaceholder()]);
  return synthesizeSequence([def, ...body]);
}
