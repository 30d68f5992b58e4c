// src/core/config/index.ts
// Configuration system exports

export {
  type ReverseConfig,
  type ValidatorSettings,
  type CliConfig,
  type WwdslConfig,
  type ConfigLayer,
  type ConfigValidation,
  DEFAULT_REVERSE_CONFIG,
  DEFAULT_VALIDATOR_SETTINGS,
  DEFAULT_CONFIG,
  KNOWN_PASS_IDS,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
