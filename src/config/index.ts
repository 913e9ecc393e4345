// src/config/index.ts
// Configuration system exports

export {
  type UnknownTagPolicy,
  type ConvertConfig,
  type ConfigValidation,
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
