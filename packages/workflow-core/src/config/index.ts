export {
  EngineConfigSchema,
  RedeclarePolicySchema,
  LogLevelSchema,
  ENGINE_ENV_VARS,
  DEFAULT_ENGINE_CONFIG,
  ConfigurationError,
  resolveEngineConfig,
} from "./schema.js";
export type { EngineConfig, EngineConfigInput, RedeclarePolicy } from "./schema.js";
