// src/core/config/index.ts
// Configuration system exports

export {
  type OutputFormat,
  type ResolverConfig,
  type PublishConfig,
  type OutputConfig,
  type LivetagConfig,
  type ConfigLayer,
  type ConfigValidation,
  DEFAULT_RESOLVER_CONFIG,
  DEFAULT_PUBLISH_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
