/**
 * @fileoverview Engine configuration
 */

export {
  DEFAULT_COMMUNITY_SEED,
  DEFAULT_EIGENVECTOR_MAX_ITERATIONS,
  DEFAULT_EIGENVECTOR_TOLERANCE,
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  LogLevelSchema,
  resolveEngineConfig,
  readEnvConfig,
  loadEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
  type LoadEngineConfigOptions,
} from './engine_config.js';
