/**
 * Configuration module exports
 */

export {
  loadLLMConfig,
  getConfigPath,
  clearConfigCache,
  createSampleConfig,
  DEFAULT_LLM_CONFIG,
  LLM_ENV_MAPPINGS,
  type LLMConfig,
} from './llm-config';

export {
  loadEngineConfig,
  DEFAULT_ENGINE_CONFIG,
  ENGINE_ENV_MAPPINGS,
  type EngineConfig,
} from './engine-config';

export { findConfigFile, CONFIG_PATHS } from './config-file';
