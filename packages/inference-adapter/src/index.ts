/**
 * Inference Adapter Package
 *
 * Provides a unified interface over heavy/fast inference backends.
 * Can be tested independently of the engine.
 */

export * from './types';
export { AnthropicInferenceAdapter, extractText } from './anthropic-adapter';

// Logger utilities
export {
  createInferenceLogger,
  configureInferenceLogger,
  startOperationTimer,
  type InferenceLoggerConfig,
  type InferenceLogEntry,
  type InferenceModuleLogger,
  type LogLevel,
} from './logger';
