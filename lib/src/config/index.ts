/**
 * Configuration Module
 */

export {
  EnvironmentSchema,
  type Environment,
  EngineConfigSchema,
  type EngineConfig,
  ApiConfigSchema,
  type ApiConfig,
  loadEngineConfig,
  getRateGovernorOptions,
  resolveApiConfig,
  getOptimalBatchSize,
} from './config.js';
