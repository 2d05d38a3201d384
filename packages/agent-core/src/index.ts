/**
 * Agent Core Package
 *
 * Orchestrator → workers task routing on a LangGraph state machine:
 * - Orchestrator: deterministic routing over TaskState (never calls a model)
 * - Workers: single-purpose handlers with schema-checked output
 * - Engine: route / dispatch / merge loop with step and timeout bounds
 */

// Engine
export {
  createEngine,
  describeOutcome,
  recursionLimitFor,
  type Engine,
  type EngineNodeName,
  type CreateEngineOptions,
  type RunOptions,
  type TaskOutcome,
  type TransitionListener,
} from './engine';

// State, routing and graph nodes
export * from './orchestrator';

// Workers
export * from './workers';

// Errors
export {
  RouteGraphError,
  RoutingError,
  OutputValidationError,
  WorkerTimeoutError,
  WorkerExecutionError,
  FatalEngineError,
  toTaskFailure,
  type ErrorKind,
  type RecoverableErrorKind,
  type TaskFailure,
} from './errors';

// Configuration
export * from './config';

// Tracing
export * from './tracing';
