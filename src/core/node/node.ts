// src/core/node/node.ts
// Host node model: immutable tagged tree with opaque source metadata

export interface Span {
  file?: string;
  startLine?: number;
  startCol?: number;
  endLine?: number;
  endCol?: number;
}

export interface NodeMeta {
  span?: Span;
  attrs?: Record<string, unknown>;
}

export type TokenValue = string | number | boolean | null;

export type Node =
  | { readonly tag: "Token"; readonly value: TokenValue; readonly text?: string; readonly meta?: NodeMeta }
  | { readonly tag: "Str"; readonly text: string; readonly meta?: NodeMeta }
  | { readonly tag: "List"; readonly children: readonly Node[]; readonly meta?: NodeMeta }
  | { readonly tag: "Vector"; readonly children: readonly Node[]; readonly meta?: NodeMeta }
  | { readonly tag: "Map"; readonly pairs: readonly MapPair[]; readonly meta?: NodeMeta };

export type MapPair = readonly [Node, Node];

export type TokenNode = Extract<Node, { tag: "Token" }>;
export type StrNode = Extract<Node, { tag: "Str" }>;
export type ListNode = Extract<Node, { tag: "List" }>;
export type VectorNode = Extract<Node, { tag: "Vector" }>;
export type MapNode = Extract<Node, { tag: "Map" }>;

export function token(value: TokenValue, meta?: NodeMeta): TokenNode {
  return meta ? { tag: "Token", value, meta } : { tag: "Token", value };
}

/**
 * Numeric token that keeps its source spelling. The printed form is the
 * spelling; `value` is the nearest double.
 */
export function numeral(text: string, meta?: NodeMeta): TokenNode {
  const value = Number(text);
  return meta ? { tag: "Token", value, text, meta } : { tag: "Token", value, text };
}

export function str(text: string, meta?: NodeMeta): StrNode {
  return meta ? { tag: "Str", text, meta } : { tag: "Str", text };
}

export function list(children: readonly Node[], meta?: NodeMeta): ListNode {
  return meta ? { tag: "List", children, meta } : { tag: "List", children };
}

export function vector(children: readonly Node[], meta?: NodeMeta): VectorNode {
  return meta ? { tag: "Vector", children, meta } : { tag: "Vector", children };
}

export function map(pairs: readonly MapPair[], meta?: NodeMeta): MapNode {
  return meta ? { tag: "Map", pairs, meta } : { tag: "Map", pairs };
}

export const isToken = (n: Node): n is TokenNode => n.tag === "Token";
export const isStr = (n: Node): n is StrNode => n.tag === "Str";
export const isList = (n: Node): n is ListNode => n.tag === "List";
export const isVector = (n: Node): n is VectorNode => n.tag === "Vector";
export const isMap = (n: Node): n is MapNode => n.tag === "Map";

/** Symbol tokens are string-valued tokens that are not keywords. */
export function isSymbol(n: Node): n is TokenNode & { readonly value: string } {
  return n.tag === "Token" && typeof n.value === "string" && !n.value.startsWith(":");
}

/**
 * Fresh node with the same children and the given metadata.
 * Children are shared, never copied.
 */
export function withMeta(n: Node, meta: NodeMeta | undefined): Node {
  switch (n.tag) {
    case "Token": return n.text === undefined ? token(n.value, meta) : numeral(n.text, meta);
    case "Str": return str(n.text, meta);
    case "List": return list(n.children, meta);
    case "Vector": return vector(n.children, meta);
    case "Map": return map(n.pairs, meta);
  }
}

/** Structural equality; metadata is ignored. */
export function nodeEq(a: Node, b: Node): boolean {
  switch (a.tag) {
    case "Token":
      if (b.tag !== "Token") return false;
      return a.text !== undefined && b.text !== undefined ? a.text === b.text : a.value === b.value;
    case "Str": return b.tag === "Str" && a.text === b.text;
    case "List": return b.tag === "List" && childrenEq(a.children, b.children);
    case "Vector": return b.tag === "Vector" && childrenEq(a.children, b.children);
    case "Map": {
      if (b.tag !== "Map" || a.pairs.length !== b.pairs.length) return false;
      return a.pairs.every(([k, v], i) => {
        const [bk, bv] = b.pairs[i];
        return nodeEq(k, bk) && nodeEq(v, bv);
      });
    }
  }
}

function childrenEq(as: readonly Node[], bs: readonly Node[]): boolean {
  if (as.length !== bs.length) return false;
  for (let i = 0; i < as.length; i++) if (!nodeEq(as[i], bs[i])) return false;
  return true;
}

export function nodeToString(n: Node): string {
  switch (n.tag) {
    case "Token": return n.text ?? (n.value === null ? "nil" : String(n.value));
    case "Str": return JSON.stringify(n.text);
    case "List": {
      // quote sugar
      const [head, arg] = n.children;
      if (n.children.length === 2 && head.tag === "Token" && head.value === "quote") {
        return `'${nodeToString(arg)}`;
      }
      return `(${n.children.map(nodeToString).join(" ")})`;
    }
    case "Vector": return `[${n.children.map(nodeToString).join(" ")}]`;
    case "Map": return `{${n.pairs.map(([k, v]) => `${nodeToString(k)} ${nodeToString(v)}`).join(" ")}}`;
  }
}
