/**
 * Trace Context
 *
 * Each task run gets a traceId that flows through the CLI, the engine nodes
 * and the workers. It travels in the graph's runnable config, never in
 * TaskState, so state stays reproducible across runs.
 */

/**
 * Trace context that flows through all operations
 */
export interface TraceContext {
  /** Unique ID for the entire task run */
  traceId: string;
  /** Unique ID for the current operation/span */
  spanId: string;
  /** Parent span ID for hierarchical tracing */
  parentSpanId?: string;
  /** Start time of this span in milliseconds */
  startTime: number;
  metadata: Record<string, unknown>;
}

function randomId(length: number = 8): string {
  const chars = 'abcdefghijklmnopqrstuvwxyz0123456789';
  let result = '';
  for (let i = 0; i < length; i++) {
    result += chars.charAt(Math.floor(Math.random() * chars.length));
  }
  return result;
}

export function generateTraceId(): string {
  return `trace_${Date.now()}_${randomId(8)}`;
}

export function generateSpanId(): string {
  return `span_${randomId(12)}`;
}

/**
 * Create a new trace context for a task
 */
export function createTraceContext(task: string, metadata?: Record<string, unknown>): TraceContext {
  return {
    traceId: generateTraceId(),
    spanId: generateSpanId(),
    startTime: Date.now(),
    metadata: {
      task: task.split('\n', 1)[0].substring(0, 100),
      ...metadata,
    },
  };
}

/**
 * Create a child span from a parent context
 */
export function createChildSpan(
  parent: TraceContext,
  name: string,
  additionalMetadata?: Record<string, unknown>
): TraceContext {
  return {
    traceId: parent.traceId,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    startTime: Date.now(),
    metadata: {
      ...parent.metadata,
      spanName: name,
      ...additionalMetadata,
    },
  };
}

export function isTraceContext(value: unknown): value is TraceContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    'traceId' in value &&
    typeof value.traceId === 'string' &&
    'spanId' in value &&
    typeof value.spanId === 'string'
  );
}
