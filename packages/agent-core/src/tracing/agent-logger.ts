/**
 * Agent Logger
 *
 * Structured logger for the agent-core package and the CLI.
 * Entries carry the trace context so one task run can be followed
 * across routing, dispatch and merge.
 *
 * Console output goes to stderr; stdout is reserved for task results.
 */

import type { TraceContext } from './trace-context';

// ============================================
// Types
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogLayer = 'cli' | 'engine';

/**
 * Structured log entry
 */
export interface StructuredLogEntry {
  timestamp: string;
  level: LogLevel;
  layer: LogLayer;
  module: string;
  traceId?: string;
  spanId?: string;
  message: string;
  duration?: number;
  data?: Record<string, unknown>;
}

/**
 * Logger configuration
 */
export interface AgentLoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  layer: LogLayer;
  consoleOutput: boolean;
  /** Custom log handler for integration with external systems */
  customHandler?: (entry: StructuredLogEntry) => void;
}

// ============================================
// Constants
// ============================================

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: AgentLoggerConfig = {
  level: 'info',
  layer: 'engine',
  consoleOutput: true,
};

// ============================================
// Global State
// ============================================

// Shared through globalThis so the CLI and the workspace package
// configure the same logger even when loaded from different paths
declare global {
  // eslint-disable-next-line no-var
  var __routegraphLoggerConfig: AgentLoggerConfig | undefined;
}

function getGlobalConfig(): AgentLoggerConfig {
  if (!globalThis.__routegraphLoggerConfig) {
    globalThis.__routegraphLoggerConfig = { ...DEFAULT_CONFIG };
  }
  return globalThis.__routegraphLoggerConfig;
}

/**
 * Configure the agent logger
 */
export function configureAgentLogger(config: Partial<AgentLoggerConfig>): void {
  const currentConfig = getGlobalConfig();
  globalThis.__routegraphLoggerConfig = { ...currentConfig, ...config };
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// Formatting
// ============================================

/**
 * Format a log entry as a string for console output
 */
function formatLogEntry(entry: StructuredLogEntry): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const moduleStr = `[${entry.layer}:${entry.module}]`;

  let line = `${entry.timestamp} ${levelStr} ${moduleStr}`;

  if (entry.traceId) {
    line += ` traceId=${entry.traceId}`;
  }
  if (entry.spanId) {
    line += ` spanId=${entry.spanId}`;
  }

  line += ` ${entry.message}`;

  if (entry.duration !== undefined) {
    line += ` (${entry.duration}ms)`;
  }

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += ` ${JSON.stringify(entry.data)}`;
  }

  return line;
}

// ============================================
// Core Logging
// ============================================

function writeLog(
  level: LogLevel,
  module: string,
  message: string,
  data?: Record<string, unknown>,
  traceContext?: TraceContext,
  duration?: number
): void {
  const config = getGlobalConfig();

  if (LOG_LEVELS[level] < LOG_LEVELS[config.level]) {
    return;
  }

  const entry: StructuredLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    layer: config.layer,
    module,
    traceId: traceContext?.traceId,
    spanId: traceContext?.spanId,
    message,
    duration,
    data,
  };

  if (config.consoleOutput) {
    console.error(formatLogEntry(entry));
  }

  if (config.customHandler) {
    config.customHandler(entry);
  }
}

// ============================================
// Module Logger
// ============================================

/**
 * Logger instance for a specific module
 */
export interface ModuleAgentLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;

  /** Log with explicit trace context; a missing context logs without ids */
  debugWithTrace(ctx: TraceContext | undefined, message: string, data?: Record<string, unknown>): void;
  infoWithTrace(ctx: TraceContext | undefined, message: string, data?: Record<string, unknown>): void;
  warnWithTrace(ctx: TraceContext | undefined, message: string, data?: Record<string, unknown>): void;
  errorWithTrace(ctx: TraceContext | undefined, message: string, data?: Record<string, unknown>): void;

  infoWithDuration(
    message: string,
    duration: number,
    data?: Record<string, unknown>
  ): void;

  /** Create a child logger with additional module prefix */
  child(subModule: string): ModuleAgentLogger;
}

/**
 * Create a logger for a specific module
 */
export function createAgentLogger(module: string): ModuleAgentLogger {
  return {
    debug: (message, data) => writeLog('debug', module, message, data),
    info: (message, data) => writeLog('info', module, message, data),
    warn: (message, data) => writeLog('warn', module, message, data),
    error: (message, data) => writeLog('error', module, message, data),

    debugWithTrace: (ctx, message, data) => writeLog('debug', module, message, data, ctx),
    infoWithTrace: (ctx, message, data) => writeLog('info', module, message, data, ctx),
    warnWithTrace: (ctx, message, data) => writeLog('warn', module, message, data, ctx),
    errorWithTrace: (ctx, message, data) => writeLog('error', module, message, data, ctx),

    infoWithDuration: (message, duration, data) =>
      writeLog('info', module, message, data, undefined, duration),

    child: (subModule) => createAgentLogger(`${module}:${subModule}`),
  };
}

// ============================================
// Performance Timing
// ============================================

export interface OperationTimer {
  /** End the timer and log the result */
  end(message?: string, data?: Record<string, unknown>): number;
  /** End the timer without logging */
  endSilent(): number;
}

/**
 * Start a timer for an operation
 */
export function startTimer(
  logger: ModuleAgentLogger,
  operationName: string,
  traceContext?: TraceContext
): OperationTimer {
  const startTime = Date.now();

  return {
    end: (message, data) => {
      const duration = Date.now() - startTime;
      const msg = message || `${operationName} completed`;
      if (traceContext) {
        logger.infoWithTrace(traceContext, msg, { ...data, duration });
      } else {
        logger.infoWithDuration(msg, duration, data);
      }
      return duration;
    },
    endSilent: () => Date.now() - startTime,
  };
}
