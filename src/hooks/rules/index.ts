import type { HookFamily, HookRule } from "../types";
import {
  configMap,
  fixedThree,
  flatPairs,
  optionalConfig,
  optionalConfigSymbol,
  singleResource,
} from "./bindings";
import {
  bodyOnly,
  docSkippingBody,
  docSkippingDefinition,
  labelStripping,
  parameterCapture,
} from "./bodies";

export const RULES: Readonly<Record<HookFamily, HookRule>> = Object.freeze({
  "single-resource": singleResource,
  "flat-pairs": flatPairs,
  "config-map": configMap,
  "optional-config": optionalConfig,
  "optional-config-symbol": optionalConfigSymbol,
  "fixed-three": fixedThree,
  "label-stripping": labelStripping,
  "doc-skipping-definition": docSkippingDefinition,
  "doc-skipping-body": docSkippingBody,
  "body-only": bodyOnly,
  "parameter-capture": parameterCapture,
});

export function isHookFamily(family: string): family is HookFamily {
  return Object.prototype.hasOwnProperty.call(RULES, family);
}

export const HOOK_FAMILIES: readonly HookFamily[] = Object.keys(RULES).filter(isHookFamily);

export {
  configMap,
  fixedThree,
  flatPairs,
  optionalConfig,
  optionalConfigSymbol,
  singleResource,
  bodyOnly,
  docSkippingBody,
  docSkippingDefinition,
  labelStripping,
  parameterCapture,
};
