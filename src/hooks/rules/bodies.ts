// src/hooks/rules/bodies.ts
// Step and test-definition macros: labels and docs dropped, bodies kept

import type { HookRule } from "../types";
import { argumentsOf, describeShape, isStringLiteral, isVectorShaped, violation } from "../shape";
import { synthesizeDeclaration, synthesizeFunctionLiteral, synthesizeSequence } from "../synth";

/**
 * (step "label")         -> (do "label")
 * (step "label" body...) -> (do body...)
 *
 * A lone label is analyzed as an ordinary expression; with a body it is
 * dropped whatever its shape.
 */
export const labelStripping: HookRule = invocation => {
  const args = argumentsOf(invocation);
  const kept = args.length === 1 ? args : args.slice(1);
  return { ok: true, value: synthesizeSequence(kept) };
};

/**
 * (defdescribe name "doc"? attrs? children...) -> (do (def name nil) attrs? children...)
 */
export const docSkippingDefinition: HookRule = invocation => {
  const [name, ...rest] = argumentsOf(invocation);
  if (name === undefined) {
    return violation("a name", describeShape(name));
  }
  const children = isStringLiteral(rest[0]) ? rest.slice(1) : rest;
  return { ok: true, value: synthesizeDeclaration(name, children) };
};

/**
 * (describe doc attrs? children...) -> (do attrs? children...)
 */
export const docSkippingBody: HookRule = invocation => {
  return { ok: true, value: synthesizeSequence(argumentsOf(invocation).slice(1)) };
};

/**
 * (before-each body...) -> (do body...)
 */
export const bodyOnly: HookRule = invocation => {
  return { ok: true, value: synthesizeSequence(argumentsOf(invocation)) };
};

/**
 * (around [f] body...) -> (fn [f] body...)
 */
export const parameterCapture: HookRule = invocation => {
  const [params, ...body] = argumentsOf(invocation);
  if (!isVectorShaped(params)) {
    return violation("a parameter vector", describeShape(params));
  }
  return { ok: true, value: synthesizeFunctionLiteral(params, body) };
};
