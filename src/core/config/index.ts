// src/core/config/index.ts
// Configuration system exports

export {
  type ViolationSeverity,
  type HooksConfig,
  type ConfigValidation,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  resolveMacroName,
  isDisabled,
  validateConfig,
} from "./config";
