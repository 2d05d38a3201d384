/**
 * Configuration Tests
 *
 * Config files live in a temp directory; environment variables are stubbed.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_LLM_CONFIG,
  clearConfigCache,
  createSampleConfig,
  findConfigFile,
  loadEngineConfig,
  loadLLMConfig,
} from '../src/config';

const ENV_NAMES = [
  'ANTHROPIC_API_KEY',
  'ANTHROPIC_API_URL',
  'MODEL_HEAVY',
  'MODEL_FAST',
  'LLM_TEMPERATURE',
  'LLM_MAX_TOKENS',
  'LLM_TIMEOUT',
  'LLM_MAX_RETRIES',
  'ENGINE_MAX_STEPS',
  'ENGINE_MAX_ATTEMPTS',
  'WORKER_TIMEOUT_MS',
  'PR_MAX_CHARS',
];

describe('configuration', () => {
  let testDir: string;

  function writeConfig(content: unknown): string {
    const filePath = path.join(testDir, 'routegraph.config.json');
    fs.writeFileSync(filePath, typeof content === 'string' ? content : JSON.stringify(content));
    return filePath;
  }

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'routegraph-config-'));
    for (const name of ENV_NAMES) {
      vi.stubEnv(name, '');
    }
    clearConfigCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('findConfigFile', () => {
    it('prefers an existing custom path', () => {
      const filePath = writeConfig({});
      expect(findConfigFile(filePath)).toBe(filePath);
    });
  });

  describe('loadEngineConfig', () => {
    it('reads the engine section of the config file', () => {
      const filePath = writeConfig({ engine: { maxSteps: 5, workerTimeoutMs: 1000 } });

      expect(loadEngineConfig(undefined, filePath)).toEqual({
        ...DEFAULT_ENGINE_CONFIG,
        maxSteps: 5,
        workerTimeoutMs: 1000,
      });
    });

    it('drops invalid file values', () => {
      const filePath = writeConfig({ engine: { maxSteps: -3, maxAttemptsPerWorker: 'many' } });

      expect(loadEngineConfig(undefined, filePath)).toEqual(DEFAULT_ENGINE_CONFIG);
    });

    it('lets env override the file and overrides win over env', () => {
      const filePath = writeConfig({ engine: { maxSteps: 5 } });
      vi.stubEnv('ENGINE_MAX_STEPS', '8');
      vi.stubEnv('ENGINE_MAX_ATTEMPTS', '3');

      const config = loadEngineConfig({ maxAttemptsPerWorker: 4 }, filePath);

      expect(config.maxSteps).toBe(8);
      expect(config.maxAttemptsPerWorker).toBe(4);
    });

    it('ignores malformed env values', () => {
      const filePath = writeConfig({});
      vi.stubEnv('WORKER_TIMEOUT_MS', 'soon');
      vi.stubEnv('PR_MAX_CHARS', '0');

      const config = loadEngineConfig(undefined, filePath);

      expect(config.workerTimeoutMs).toBe(DEFAULT_ENGINE_CONFIG.workerTimeoutMs);
      expect(config.maxSubjectChars).toBe(DEFAULT_ENGINE_CONFIG.maxSubjectChars);
    });

    it('treats an unreadable file as empty', () => {
      const filePath = writeConfig('{ not json');
      expect(loadEngineConfig(undefined, filePath)).toEqual(DEFAULT_ENGINE_CONFIG);
    });
  });

  describe('loadLLMConfig', () => {
    it('merges file, env and overrides in priority order', () => {
      const filePath = writeConfig({
        llm: { heavyModel: 'file-heavy', fastModel: 'file-fast', temperature: 0.5 },
      });
      vi.stubEnv('MODEL_FAST', 'env-fast');
      vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');

      const config = loadLLMConfig({ temperature: 0.1 }, filePath);

      expect(config).toEqual({
        ...DEFAULT_LLM_CONFIG,
        apiKey: 'test-secret',
        heavyModel: 'file-heavy',
        fastModel: 'env-fast',
        temperature: 0.1,
      });
    });

    it('clamps temperature from the file', () => {
      const filePath = writeConfig({ llm: { temperature: 7 } });
      expect(loadLLMConfig(undefined, filePath).temperature).toBe(2);
    });

    it('parses numeric env values', () => {
      const filePath = writeConfig({});
      vi.stubEnv('LLM_TEMPERATURE', '0.7');
      vi.stubEnv('LLM_MAX_TOKENS', '2048');

      const config = loadLLMConfig(undefined, filePath);

      expect(config.temperature).toBe(0.7);
      expect(config.maxTokens).toBe(2048);
    });
  });

  describe('createSampleConfig', () => {
    it('writes a config both loaders accept', () => {
      const outputPath = createSampleConfig(path.join(testDir, 'sample.json'));

      const written = JSON.parse(fs.readFileSync(outputPath, 'utf-8'));
      expect(written.engine).toEqual(DEFAULT_ENGINE_CONFIG);
      expect(written.llm.heavyModel).toBe(DEFAULT_LLM_CONFIG.heavyModel);
      expect(loadEngineConfig(undefined, outputPath)).toEqual(DEFAULT_ENGINE_CONFIG);
    });
  });
});
