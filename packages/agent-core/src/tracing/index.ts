/**
 * Tracing Module
 *
 * Trace context and structured logging shared by the engine and the CLI.
 */

// Trace Context
export {
  type TraceContext,
  generateTraceId,
  generateSpanId,
  createTraceContext,
  createChildSpan,
  isTraceContext,
} from './trace-context';

// Agent Logger
export {
  type LogLevel,
  type LogLayer,
  type StructuredLogEntry,
  type AgentLoggerConfig,
  type ModuleAgentLogger,
  type OperationTimer,
  LOG_LEVELS,
  configureAgentLogger,
  isLogLevel,
  createAgentLogger,
  startTimer,
} from './agent-logger';

// LangSmith Integration (Optional)
export {
  type LangSmithConfig,
  getLangSmithConfig,
  initLangSmith,
} from './langsmith';
