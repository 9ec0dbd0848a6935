import type { ListNode, Node } from "../core/node";
import type { ShapeResult } from "./shape";

/**
 * Rewrite families. Every catalog macro maps to exactly one.
 */
export type HookFamily =
  | "single-resource"          // (with-x [sym expr?] body...)     -> (let [sym expr] body...)
  | "flat-pairs"               // (with-xs [a ea b eb] body...)     -> (let [a ea b eb] body...)
  | "config-map"               // (with-x cfg body...)              -> (let [_ cfg] body...)
  | "optional-config"          // (with-x cfg? body...)             -> let or do, by arity
  | "optional-config-symbol"   // (with-x cfg? [sym] body...)       -> (let [_ cfg sym nil] body...)
  | "fixed-three"              // (with-x a b [sym] body...)        -> (let [a a b b sym nil] body...)
  | "label-stripping"          // (step label body...)              -> (do body...)
  | "doc-skipping-definition"  // (defx name doc? attrs? & kids)    -> (do (def name nil) attrs? kids...)
  | "doc-skipping-body"        // (x doc & rest)                    -> (do rest...)
  | "body-only"                // (x & body)                        -> (do body...)
  | "parameter-capture";       // (x [f] & body)                    -> (fn [f] body...)

/**
 * A rule never mutates its input and never throws on malformed input.
 */
export type HookRule = (invocation: ListNode) => ShapeResult<Node>;

export interface HookDoc {
  summary: string;
  detail?: string;
  examples?: Array<{
    input: string;
    output: string;
    description?: string;
  }>;
}

export interface HookDescriptor {
  /** Fully-qualified macro name, e.g. "browser.core/with-page" */
  id: string;

  family: HookFamily;

  doc: HookDoc;
}
