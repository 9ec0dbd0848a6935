// src/hooks/rules/bindings.ts
// Lifecycle macros that introduce bindings: rewritten to let

import { list, token } from "../../core/node";
import type { HookRule } from "../types";
import { argumentsOf, describeShape, isVectorShaped, matchBindingVector, violation } from "../shape";
import {
  anonymousSymbol,
  emptyMapPlaceholder,
  nilPlaceholder,
  synthesizeBinding,
  synthesizeSequence,
} from "../synth";

/**
 * (with-page [pg expr] body...) or (with-page [pg] body...)
 *   -> (let [pg expr] body...) / (let [pg nil] body...)
 */
export const singleResource: HookRule = invocation => {
  const [bindings, ...body] = argumentsOf(invocation);
  const matched = matchBindingVector(bindings, 1, 2);
  if (!matched.ok) return matched;
  return { ok: true, value: synthesizeBinding(matched.value, body) };
};

/**
 * Same shape as with-open: (with-xs [a ea b eb] body...) -> (let [a ea b eb] body...)
 * The binding vector goes into the let as written.
 */
export const flatPairs: HookRule = invocation => {
  const [bindings, ...body] = argumentsOf(invocation);
  if (!isVectorShaped(bindings)) {
    return violation("a binding vector", describeShape(bindings));
  }
  if (bindings.children.length % 2 !== 0) {
    return violation("an even number of binding forms", describeShape(bindings));
  }
  return { ok: true, value: list([token("let"), bindings, ...body]) };
};

/**
 * (with-hooks {:on-request f} body...) -> (let [_ {:on-request f}] body...)
 * The config is analyzed without becoming a named binding.
 */
export const configMap: HookRule = invocation => {
  const [config, ...body] = argumentsOf(invocation);
  if (config === undefined) {
    return violation("a config expression", describeShape(config));
  }
  return { ok: true, value: synthesizeBinding([{ target: anonymousSymbol(), init: config }], body) };
};

/**
 * (with-retry body)          -> (do body)
 * (with-retry opts body...)  -> (let [_ opts] body...)
 */
export const optionalConfig: HookRule = invocation => {
  const args = argumentsOf(invocation);
  if (args.length <= 1) {
    return { ok: true, value: synthesizeSequence(args) };
  }
  const [config, ...body] = args;
  return { ok: true, value: synthesizeBinding([{ target: anonymousSymbol(), init: config }], body) };
};

/**
 * (with-testing-page [pg] body...)       -> (let [_ {} pg nil] body...)
 * (with-testing-page opts [pg] body...)  -> (let [_ opts pg nil] body...)
 */
export const optionalConfigSymbol: HookRule = invocation => {
  const [first, ...rest] = argumentsOf(invocation);
  if (first === undefined) {
    return violation("a binding vector", describeShape(first));
  }

  const configOmitted = isVectorShaped(first);
  const config = configOmitted ? emptyMapPlaceholder() : first;
  const bindings = configOmitted ? first : rest[0];
  const body = configOmitted ? rest : rest.slice(1);

  const matched = matchBindingVector(bindings, 1, 1);
  if (!matched.ok) return matched;

  return {
    ok: true,
    value: synthesizeBinding(
      [
        { target: anonymousSymbol(), init: config },
        { target: matched.value[0].target, init: nilPlaceholder() },
      ],
      body
    ),
  };
};

/**
 * (with-page-api pg opts [ctx] body...) -> (let [pg pg opts opts ctx nil] body...)
 * Self-binding forces analysis of pg and opts without renaming them.
 */
export const fixedThree: HookRule = invocation => {
  const [a, b, bindings, ...body] = argumentsOf(invocation);
  const matched = matchBindingVector(bindings, 1, 1);
  if (!matched.ok) return matched;

  return {
    ok: true,
    value: synthesizeBinding(
      [
        { target: a, init: a },
        { target: b, init: b },
        { target: matched.value[0].target, init: nilPlaceholder() },
      ],
      body
    ),
  };
};
