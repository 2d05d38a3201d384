/**
 * LangSmith Integration
 *
 * LangGraph reports runs to LangSmith on its own once the environment
 * variables are set; this module only detects and reports that setup.
 */

import { createAgentLogger } from './agent-logger';

const log = createAgentLogger('LangSmith');

export interface LangSmithConfig {
  apiKey?: string;
  project: string;
  endpoint?: string;
  enabled: boolean;
}

const DEFAULT_PROJECT = 'routegraph';

/**
 * Read LangSmith configuration from an environment (process.env by default)
 */
export function getLangSmithConfig(env: NodeJS.ProcessEnv = process.env): LangSmithConfig {
  const apiKey = env.LANGSMITH_API_KEY || env.LANGCHAIN_API_KEY;
  const project = env.LANGSMITH_PROJECT || env.LANGCHAIN_PROJECT || DEFAULT_PROJECT;
  const endpoint = env.LANGSMITH_ENDPOINT || env.LANGCHAIN_ENDPOINT;
  const tracingEnabled = env.LANGSMITH_TRACING === 'true' || env.LANGCHAIN_TRACING_V2 === 'true';

  return {
    apiKey,
    project,
    endpoint,
    enabled: !!apiKey && tracingEnabled,
  };
}

/**
 * Log whether LangSmith tracing is active. Call once at startup.
 */
export function initLangSmith(env: NodeJS.ProcessEnv = process.env): boolean {
  const config = getLangSmithConfig(env);

  if (!config.enabled) {
    log.debug('LangSmith tracing is not enabled', {
      hasApiKey: !!config.apiKey,
    });
    return false;
  }

  log.info('LangSmith tracing enabled', {
    project: config.project,
    endpoint: config.endpoint || 'default',
  });

  return true;
}
