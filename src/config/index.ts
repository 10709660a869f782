export {
  loadConfig,
  resolveConfig,
  configFromEnv,
  deepMergeConfigs,
  type ConfigLoadResult,
  type ConfigLoadOptions,
} from './config-manager.js';
export {
  PipelineConfigSchema,
  defaultConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from './schema.js';
