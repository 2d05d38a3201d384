/**
 * Engine Configuration
 *
 * Bounds for a task run. Contains no inference settings.
 */

import _ from 'lodash';
import { z } from 'zod';
import { createAgentLogger } from '../tracing';
import { findConfigFile, readConfigSection, readNumberEnv } from './config-file';

const log = createAgentLogger('EngineConfig');

export interface EngineConfig {
  /** Orchestrator/worker round-trips before the task is failed */
  maxSteps: number;
  /** Dispatches allowed per worker, first attempt included */
  maxAttemptsPerWorker: number;
  /** Bound on a single worker invocation */
  workerTimeoutMs: number;
  /** Largest subject the orchestrator will route */
  maxSubjectChars: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxSteps: 12,
  maxAttemptsPerWorker: 2,
  workerTimeoutMs: 120000,
  maxSubjectChars: 60000,
};

export const ENGINE_ENV_MAPPINGS: Record<keyof EngineConfig, string> = {
  maxSteps: 'ENGINE_MAX_STEPS',
  maxAttemptsPerWorker: 'ENGINE_MAX_ATTEMPTS',
  workerTimeoutMs: 'WORKER_TIMEOUT_MS',
  maxSubjectChars: 'PR_MAX_CHARS',
};

const positiveInt = z.number().int().positive().optional().catch(undefined);

const fileConfigSchema = z.object({
  maxSteps: positiveInt,
  maxAttemptsPerWorker: positiveInt,
  workerTimeoutMs: positiveInt,
  maxSubjectChars: positiveInt,
});

function positiveOrUndefined(value: number | undefined): number | undefined {
  return value !== undefined && value > 0 ? value : undefined;
}

function loadEnvConfig(): Partial<EngineConfig> {
  return _.omitBy<Partial<EngineConfig>>(
    {
      maxSteps: positiveOrUndefined(readNumberEnv(ENGINE_ENV_MAPPINGS.maxSteps)),
      maxAttemptsPerWorker: positiveOrUndefined(readNumberEnv(ENGINE_ENV_MAPPINGS.maxAttemptsPerWorker)),
      workerTimeoutMs: positiveOrUndefined(readNumberEnv(ENGINE_ENV_MAPPINGS.workerTimeoutMs)),
      maxSubjectChars: positiveOrUndefined(readNumberEnv(ENGINE_ENV_MAPPINGS.maxSubjectChars)),
    },
    _.isNil
  );
}

/**
 * Load engine configuration. Same priority as the LLM config:
 * overrides > env > config file ("engine" section) > defaults.
 */
export function loadEngineConfig(
  overrides?: Partial<EngineConfig>,
  customConfigPath?: string
): EngineConfig {
  const configPath = findConfigFile(customConfigPath);
  let fileConfig: Partial<EngineConfig> = {};
  if (configPath) {
    const parsed = fileConfigSchema.safeParse(readConfigSection(configPath, 'engine'));
    if (parsed.success) {
      fileConfig = _.omitBy<Partial<EngineConfig>>(parsed.data, _.isNil);
    } else {
      log.warn('Ignoring malformed engine config section', { configPath });
    }
  }

  const runtimeConfig: Partial<EngineConfig> = overrides ?? {};
  const config: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    ...fileConfig,
    ...loadEnvConfig(),
    ..._.omitBy<Partial<EngineConfig>>(runtimeConfig, _.isNil),
  };

  log.debug('Resolved engine config', { ...config });
  return config;
}
