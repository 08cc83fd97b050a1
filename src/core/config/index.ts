// src/core/config/index.ts
// Configuration system exports

export {
  type OpaqueCallStyle,
  type NotationConfig,
  type RuntimeConfig,
  type TexformConfig,
  type ConfigOverrides,
  type ConfigValidation,
  OPAQUE_CALL_STYLES,
  DEFAULT_NOTATION_CONFIG,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
