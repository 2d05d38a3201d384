/**
 * Inference Adapter Types
 *
 * Workers ask for a completion on a model tier, never for a concrete model.
 * The adapter owns the mapping from tier to backend model.
 */

/**
 * Inference tier: "heavy" for precise multi-step reasoning,
 * "fast" for cheap mechanical transformations
 */
export type ModelTier = 'heavy' | 'fast';

/**
 * Single completion request
 */
export interface CompletionRequest {
  tier: ModelTier;
  system: string;
  prompt: string;
  /** Aborted by the engine when the worker runs out of time */
  signal?: AbortSignal;
}

/**
 * Completion returned by the backend
 */
export interface CompletionResult {
  text: string;
  /** Concrete model that served the request */
  model: string;
}

/**
 * Inference Adapter Interface
 *
 * The only surface workers see. Tests swap in scripted implementations.
 */
export interface IInferenceAdapter {
  complete(request: CompletionRequest): Promise<CompletionResult>;
  /** Model identifier selected for a tier */
  modelFor(tier: ModelTier): string;
}

/**
 * Inference adapter configuration
 */
export interface InferenceAdapterConfig {
  apiKey?: string;
  baseUrl?: string;
  heavyModel: string;
  fastModel: string;
  temperature: number;
  maxTokens?: number;
  /** Per-request timeout in ms */
  timeout?: number;
  maxRetries: number;
}

/**
 * Default configuration
 */
export const DEFAULT_INFERENCE_ADAPTER_CONFIG: InferenceAdapterConfig = {
  heavyModel: 'claude-sonnet-4-20250514',
  fastModel: 'claude-3-5-haiku-20241022',
  temperature: 0,
  maxRetries: 3,
};
