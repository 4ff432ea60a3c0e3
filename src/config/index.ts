export {
  ENGINE_DEFAULTS,
  FIELD_DEFAULTS,
  ENV_VARS,
  type TrailingAtomPlacement,
  type LogLevel,
  type EngineConfig,
} from './constants.js';
export {
  loadEnv,
  resolveEngineConfig,
  type EnvSource,
  type LoadEnvOptions,
  type LoadEnvResult,
} from './env.js';
