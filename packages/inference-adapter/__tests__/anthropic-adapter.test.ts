/**
 * Anthropic Adapter Tests
 *
 * ChatAnthropic is mocked; no request leaves the process.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  constructed: [] as Array<Record<string, unknown>>,
  invoke: vi.fn(),
}));

vi.mock('@langchain/anthropic', () => ({
  ChatAnthropic: class {
    constructor(fields: Record<string, unknown>) {
      mocks.constructed.push(fields);
    }
    invoke = mocks.invoke;
  },
}));

import { AnthropicInferenceAdapter, extractText } from '../src/anthropic-adapter';
import { configureInferenceLogger } from '../src/logger';

describe('extractText', () => {
  it('returns string content unchanged', () => {
    expect(extractText('plain reply')).toBe('plain reply');
  });

  it('joins text blocks and skips other blocks', () => {
    const content = [
      { type: 'text', text: 'first ' },
      { type: 'image_url', image_url: 'data:' },
      { type: 'text', text: 'second' },
    ];
    expect(extractText(content)).toBe('first second');
  });

  it('returns empty string for unsupported content', () => {
    expect(extractText(undefined)).toBe('');
    expect(extractText(42)).toBe('');
  });
});

describe('AnthropicInferenceAdapter', () => {
  beforeEach(() => {
    configureInferenceLogger({ consoleOutput: false });
    mocks.constructed.length = 0;
    mocks.invoke.mockReset();
  });

  it('maps tiers to the configured models', () => {
    const adapter = new AnthropicInferenceAdapter({
      heavyModel: 'heavy-model',
      fastModel: 'fast-model',
    });

    expect(adapter.modelFor('heavy')).toBe('heavy-model');
    expect(adapter.modelFor('fast')).toBe('fast-model');
  });

  it('sends system and user prompt to the tier model', async () => {
    mocks.invoke.mockResolvedValue({ content: '{"findings":[]}' });
    const adapter = new AnthropicInferenceAdapter({
      apiKey: 'test-secret',
      heavyModel: 'heavy-model',
      fastModel: 'fast-model',
    });

    const result = await adapter.complete({
      tier: 'fast',
      system: 'You check style.',
      prompt: 'const a=1',
    });

    expect(result).toEqual({ text: '{"findings":[]}', model: 'fast-model' });
    expect(mocks.constructed).toHaveLength(1);
    expect(mocks.constructed[0]).toMatchObject({
      anthropicApiKey: 'test-secret',
      modelName: 'fast-model',
      temperature: 0,
      maxRetries: 3,
    });
    expect(mocks.constructed[0]).not.toHaveProperty('anthropicApiUrl');

    const [messages] = mocks.invoke.mock.calls[0];
    expect(messages).toHaveLength(2);
    expect(messages[0].content).toBe('You check style.');
    expect(messages[1].content).toBe('const a=1');
  });

  it('reuses one client per tier', async () => {
    mocks.invoke.mockResolvedValue({ content: 'ok' });
    const adapter = new AnthropicInferenceAdapter({ baseUrl: 'http://localhost:8080' });

    await adapter.complete({ tier: 'heavy', system: 's', prompt: 'p' });
    await adapter.complete({ tier: 'heavy', system: 's', prompt: 'p' });
    await adapter.complete({ tier: 'fast', system: 's', prompt: 'p' });

    expect(mocks.constructed).toHaveLength(2);
    expect(mocks.constructed[0].anthropicApiUrl).toBe('http://localhost:8080');
  });

  it('forwards the abort signal', async () => {
    mocks.invoke.mockResolvedValue({ content: 'ok' });
    const adapter = new AnthropicInferenceAdapter();
    const controller = new AbortController();

    await adapter.complete({ tier: 'fast', system: 's', prompt: 'p', signal: controller.signal });

    expect(mocks.invoke.mock.calls[0][1]).toEqual({ signal: controller.signal });
  });

  it('passes the configured request timeout', async () => {
    mocks.invoke.mockResolvedValue({ content: 'ok' });
    const adapter = new AnthropicInferenceAdapter({ timeout: 30000 });

    await adapter.complete({ tier: 'heavy', system: 's', prompt: 'p' });

    expect(mocks.invoke.mock.calls[0][1]).toEqual({ signal: undefined, timeout: 30000 });
  });

  it('rethrows backend errors', async () => {
    mocks.invoke.mockRejectedValue(new Error('overloaded'));
    const adapter = new AnthropicInferenceAdapter();

    await expect(
      adapter.complete({ tier: 'heavy', system: 's', prompt: 'p' })
    ).rejects.toThrow('overloaded');
  });
});
