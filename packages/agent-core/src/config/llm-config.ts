/**
 * LLM Configuration Loader
 *
 * Loads inference configuration with support for:
 * - Optional fields with sensible defaults
 * - Environment variable overrides
 * - Multiple config file locations
 *
 * Only workers (through the inference adapter) consult this; the engine
 * never sees model identifiers.
 */

import * as fs from 'fs';
import _ from 'lodash';
import { z } from 'zod';
import { createAgentLogger } from '../tracing';
import { findConfigFile, readConfigSection, readNumberEnv } from './config-file';
import { DEFAULT_ENGINE_CONFIG } from './engine-config';

const log = createAgentLogger('LLMConfig');

/**
 * Full LLM configuration interface
 */
export interface LLMConfig {
  apiKey?: string;
  baseUrl?: string;

  /** Model for the "heavy" tier */
  heavyModel: string;
  /** Model for the "fast" tier */
  fastModel: string;

  temperature: number;
  maxTokens?: number;

  timeout: number;
  maxRetries: number;
}

/**
 * Default configuration values
 */
export const DEFAULT_LLM_CONFIG: LLMConfig = {
  apiKey: undefined,
  baseUrl: undefined,
  heavyModel: 'claude-sonnet-4-20250514',
  fastModel: 'claude-3-5-haiku-20241022',
  temperature: 0,
  maxTokens: undefined,
  timeout: 60000,
  maxRetries: 3,
};

/**
 * Environment variable mappings
 */
export const LLM_ENV_MAPPINGS: Record<keyof LLMConfig, string> = {
  apiKey: 'ANTHROPIC_API_KEY',
  baseUrl: 'ANTHROPIC_API_URL',
  heavyModel: 'MODEL_HEAVY',
  fastModel: 'MODEL_FAST',
  temperature: 'LLM_TEMPERATURE',
  maxTokens: 'LLM_MAX_TOKENS',
  timeout: 'LLM_TIMEOUT',
  maxRetries: 'LLM_MAX_RETRIES',
};

// Invalid fields are dropped, not fatal
const fileConfigSchema = z.object({
  apiKey: z.string().optional().catch(undefined),
  baseUrl: z.string().optional().catch(undefined),
  heavyModel: z.string().optional().catch(undefined),
  fastModel: z.string().optional().catch(undefined),
  temperature: z
    .number()
    .transform((value) => Math.max(0, Math.min(2, value)))
    .optional()
    .catch(undefined),
  maxTokens: z.number().positive().optional().catch(undefined),
  timeout: z.number().positive().optional().catch(undefined),
  maxRetries: z.number().min(0).optional().catch(undefined),
});

/**
 * Load config from a JSON file's "llm" section
 */
function loadConfigFile(filePath: string): Partial<LLMConfig> {
  const parsed = fileConfigSchema.safeParse(readConfigSection(filePath, 'llm'));
  if (!parsed.success) {
    log.warn('Ignoring malformed llm config section', { filePath });
    return {};
  }
  return _.omitBy<Partial<LLMConfig>>(parsed.data, _.isNil);
}

/**
 * Load config from environment variables
 */
function loadEnvConfig(): Partial<LLMConfig> {
  return _.omitBy<Partial<LLMConfig>>(
    {
      apiKey: process.env[LLM_ENV_MAPPINGS.apiKey] || undefined,
      baseUrl: process.env[LLM_ENV_MAPPINGS.baseUrl] || undefined,
      heavyModel: process.env[LLM_ENV_MAPPINGS.heavyModel] || undefined,
      fastModel: process.env[LLM_ENV_MAPPINGS.fastModel] || undefined,
      temperature: readNumberEnv(LLM_ENV_MAPPINGS.temperature, parseFloat),
      maxTokens: readNumberEnv(LLM_ENV_MAPPINGS.maxTokens),
      timeout: readNumberEnv(LLM_ENV_MAPPINGS.timeout),
      maxRetries: readNumberEnv(LLM_ENV_MAPPINGS.maxRetries),
    },
    _.isNil
  );
}

let cachedConfig: LLMConfig | null = null;
let cachedConfigPath: string | null = null;

/**
 * Load LLM configuration
 *
 * Priority (highest to lowest):
 * 1. Runtime overrides (passed as parameter)
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export function loadLLMConfig(
  overrides?: Partial<LLMConfig>,
  customConfigPath?: string,
  forceReload = false
): LLMConfig {
  if (cachedConfig && !forceReload && !overrides && !customConfigPath) {
    return cachedConfig;
  }

  const configPath = findConfigFile(customConfigPath);
  const fileConfig = configPath ? loadConfigFile(configPath) : {};

  if (configPath) {
    log.info('Loaded config', { configPath });
    cachedConfigPath = configPath;
  }

  const runtimeConfig: Partial<LLMConfig> = overrides ?? {};
  const mergedConfig: LLMConfig = {
    ...DEFAULT_LLM_CONFIG,
    ...fileConfig,
    ...loadEnvConfig(),
    ..._.omitBy<Partial<LLMConfig>>(runtimeConfig, _.isNil),
  };

  log.debug('Resolved LLM config', {
    ...mergedConfig,
    apiKey: mergedConfig.apiKey ? '***' : undefined,
  });

  if (!overrides && !customConfigPath) {
    cachedConfig = mergedConfig;
  }

  return mergedConfig;
}

/**
 * Get the path of the currently loaded config file
 */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}

/**
 * Clear cached config (useful for testing or hot-reload)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  cachedConfigPath = null;
}

/**
 * Create a sample config file
 */
export function createSampleConfig(outputPath = './routegraph.config.json'): string {
  const sampleConfig = {
    llm: {
      heavyModel: DEFAULT_LLM_CONFIG.heavyModel,
      fastModel: DEFAULT_LLM_CONFIG.fastModel,
      temperature: DEFAULT_LLM_CONFIG.temperature,
      timeout: DEFAULT_LLM_CONFIG.timeout,
      maxRetries: DEFAULT_LLM_CONFIG.maxRetries,
    },
    engine: { ...DEFAULT_ENGINE_CONFIG },
  };

  fs.writeFileSync(outputPath, `${JSON.stringify(sampleConfig, null, 2)}\n`, 'utf-8');
  log.info('Sample config created', { outputPath });

  return outputPath;
}
