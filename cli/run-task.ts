/**
 * The run command: resolve the task, run it through the engine, print the
 * result and optionally post the review back to the pull request.
 */

import {
  configureAgentLogger,
  createAgentLogger,
  createEngine,
  getConfigPath,
  initLangSmith,
  isLogLevel,
  loadEngineConfig,
  loadLLMConfig,
  RouteGraphError,
  type LLMConfig,
} from '@routegraph/agent-core';
import {
  AnthropicInferenceAdapter,
  configureInferenceLogger,
  type IInferenceAdapter,
} from '@routegraph/inference-adapter';
import { GitHubClient, parsePullRequestUrl, type PullRequestRef } from './github-client';
import { EXIT_FAILED, EXIT_USAGE, exitCodeFor, formatResult } from './output';
import { parsePositiveInt, resolveTaskText, UsageError } from './task-input';

const log = createAgentLogger('CLI');

/**
 * Options as parsed by commander
 */
export interface RunCommandOptions {
  file?: string;
  pr?: string;
  post?: boolean;
  maxSteps?: string;
  timeout?: string;
  logLevel?: string;
  config?: string;
}

export interface RunDependencies {
  createInference(config: LLMConfig): IInferenceAdapter;
  createGitHub(token: string | undefined): GitHubClient;
  /** Result output (stdout) */
  write(text: string): void;
  /** Error output (stderr) */
  writeError(text: string): void;
  env: NodeJS.ProcessEnv;
}

export const defaultDependencies: RunDependencies = {
  createInference(config) {
    if (!config.apiKey) {
      throw new UsageError('ANTHROPIC_API_KEY is required (env or config file)');
    }
    return new AnthropicInferenceAdapter({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      heavyModel: config.heavyModel,
      fastModel: config.fastModel,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      timeout: config.timeout,
      maxRetries: config.maxRetries,
    });
  },
  createGitHub: (token) => GitHubClient.fromToken(token),
  write: (text) => {
    process.stdout.write(`${text}\n`);
  },
  writeError: (text) => {
    process.stderr.write(`${text}\n`);
  },
  env: process.env,
};

function applyLogLevel(level: string | undefined): void {
  if (level === undefined) {
    return;
  }
  if (!isLogLevel(level)) {
    throw new UsageError(`Unknown log level "${level}" (debug, info, warn, error)`);
  }
  configureAgentLogger({ level, layer: 'cli' });
  configureInferenceLogger({ level });
}

/**
 * Run a task and return the process exit code
 */
export async function runTask(
  words: string[],
  options: RunCommandOptions,
  deps: RunDependencies = defaultDependencies
): Promise<number> {
  try {
    applyLogLevel(options.logLevel);
    initLangSmith(deps.env);

    const maxSteps = parsePositiveInt('--max-steps', options.maxSteps);
    const workerTimeoutMs = parsePositiveInt('--timeout', options.timeout);
    if (options.post && !options.pr) {
      throw new UsageError('--post requires --pr');
    }

    const task = resolveTaskText({ words, file: options.file, pr: options.pr });

    let github: GitHubClient | undefined;
    let prRef: PullRequestRef | undefined;
    let subject: string | undefined;
    if (options.pr) {
      prRef = parsePullRequestUrl(options.pr);
      github = deps.createGitHub(deps.env.GITHUB_TOKEN);
      subject = await github.getPullRequestDiff(prRef);
    }

    const engineConfig = loadEngineConfig({ maxSteps, workerTimeoutMs }, options.config);
    const inference = deps.createInference(loadLLMConfig(undefined, options.config));
    log.debug('Configuration loaded', { configFile: getConfigPath() ?? 'none' });
    const engine = createEngine({ inference, config: engineConfig });

    const state = await engine.run({ task, subject, prUrl: options.pr });
    deps.write(formatResult(state));

    if (options.post && github && prRef) {
      if (state.phase === 'terminated' && state.result) {
        try {
          await github.postComment(prRef, state.result);
        } catch (error) {
          // The result is already on stdout; only the comment is missing
          const message = error instanceof Error ? error.message : String(error);
          log.error('Posting the review failed', { error: message });
          deps.writeError(`routegraph: Could not post the review comment: ${message}`);
          return EXIT_FAILED;
        }
      } else {
        log.warn('Review did not complete; nothing posted', { phase: state.phase });
      }
    }

    return exitCodeFor(state);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (!(error instanceof UsageError) && !(error instanceof RouteGraphError)) {
      log.error('Run aborted', { error: message });
    }
    deps.writeError(`routegraph: ${message}`);
    return EXIT_USAGE;
  }
}
