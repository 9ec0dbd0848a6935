// src/core/node/index.ts
// Node model exports

export {
  type Span,
  type NodeMeta,
  type TokenValue,
  type Node,
  type MapPair,
  type TokenNode,
  type StrNode,
  type ListNode,
  type VectorNode,
  type MapNode,
  token,
  numeral,
  str,
  list,
  vector,
  map,
  isToken,
  isStr,
  isList,
  isVector,
  isMap,
  isSymbol,
  withMeta,
  nodeEq,
  nodeToString,
} from "./node";
