/**
 * Anthropic Inference Adapter
 *
 * Implementation of IInferenceAdapter on top of LangChain's ChatAnthropic.
 * One chat client per tier, created on first use.
 */

import { ChatAnthropic } from '@langchain/anthropic';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type {
  IInferenceAdapter,
  CompletionRequest,
  CompletionResult,
  InferenceAdapterConfig,
  ModelTier,
} from './types';
import { DEFAULT_INFERENCE_ADAPTER_CONFIG } from './types';
import { createInferenceLogger, startOperationTimer } from './logger';

const log = createInferenceLogger('AnthropicAdapter');

/**
 * Flatten LangChain message content (string or content blocks) to plain text
 */
export function extractText(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (!Array.isArray(content)) {
    return '';
  }
  const parts: string[] = [];
  for (const part of content) {
    if (typeof part === 'string') {
      parts.push(part);
    } else if (
      typeof part === 'object' &&
      part !== null &&
      'text' in part &&
      typeof part.text === 'string'
    ) {
      parts.push(part.text);
    }
  }
  return parts.join('');
}

export class AnthropicInferenceAdapter implements IInferenceAdapter {
  private config: InferenceAdapterConfig;
  private clients: Map<ModelTier, ChatAnthropic> = new Map();

  constructor(config: Partial<InferenceAdapterConfig> = {}) {
    this.config = { ...DEFAULT_INFERENCE_ADAPTER_CONFIG, ...config };
  }

  modelFor(tier: ModelTier): string {
    return tier === 'heavy' ? this.config.heavyModel : this.config.fastModel;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const model = this.modelFor(request.tier);
    const llm = this.getClient(request.tier);
    const timer = startOperationTimer();

    log.debug('Sending completion request', {
      tier: request.tier,
      model,
      promptLength: request.prompt.length,
    });

    try {
      const response = await llm.invoke(
        [new SystemMessage(request.system), new HumanMessage(request.prompt)],
        { signal: request.signal, timeout: this.config.timeout }
      );
      const text = extractText(response.content);

      log.infoWithDuration('Completion received', timer.end(), {
        tier: request.tier,
        model,
        responseLength: text.length,
      });

      return { text, model };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      log.error('Completion failed', { tier: request.tier, model, error: errorMessage });
      throw error;
    }
  }

  private getClient(tier: ModelTier): ChatAnthropic {
    const existing = this.clients.get(tier);
    if (existing) {
      return existing;
    }

    const client = new ChatAnthropic({
      anthropicApiKey: this.config.apiKey,
      modelName: this.modelFor(tier),
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
      maxRetries: this.config.maxRetries,
      ...(this.config.baseUrl ? { anthropicApiUrl: this.config.baseUrl } : {}),
    });
    this.clients.set(tier, client);
    return client;
  }
}
