/**
 * Inference Adapter Logger
 *
 * Simple structured logger for the inference-adapter package.
 * Outputs logs in a format compatible with the agent-core tracing system.
 */

// ============================================
// Types
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry for external handlers
 */
export interface InferenceLogEntry {
  timestamp: string;
  level: LogLevel;
  layer: 'inference';
  module: string;
  message: string;
  duration?: number;
  data?: Record<string, unknown>;
}

/**
 * Logger configuration
 */
export interface InferenceLoggerConfig {
  level: LogLevel;
  consoleOutput: boolean;
  /** Custom handler for routing logs to external systems */
  customHandler?: (entry: InferenceLogEntry) => void;
}

// ============================================
// Constants
// ============================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: InferenceLoggerConfig = {
  level: 'info',
  consoleOutput: true,
};

let config: InferenceLoggerConfig = { ...DEFAULT_CONFIG };

/**
 * Configure the inference logger
 */
export function configureInferenceLogger(newConfig: Partial<InferenceLoggerConfig>): void {
  config = { ...config, ...newConfig };
}

function formatLogEntry(entry: InferenceLogEntry): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);

  let line = `${entry.timestamp} ${levelStr} [inference:${entry.module}] ${entry.message}`;

  if (entry.duration !== undefined) {
    line += ` (${entry.duration}ms)`;
  }

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += ` ${JSON.stringify(entry.data)}`;
  }

  return line;
}

function writeLog(
  level: LogLevel,
  module: string,
  message: string,
  data?: Record<string, unknown>,
  duration?: number
): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[config.level]) {
    return;
  }

  const entry: InferenceLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    layer: 'inference',
    module,
    message,
    duration,
    data,
  };

  // stderr only: stdout belongs to the CLI result
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

export interface InferenceModuleLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  infoWithDuration(message: string, duration: number, data?: Record<string, unknown>): void;
}

/**
 * Create a logger for a specific module
 */
export function createInferenceLogger(module: string): InferenceModuleLogger {
  return {
    debug: (message, data) => writeLog('debug', module, message, data),
    info: (message, data) => writeLog('info', module, message, data),
    warn: (message, data) => writeLog('warn', module, message, data),
    error: (message, data) => writeLog('error', module, message, data),
    infoWithDuration: (message, duration, data) =>
      writeLog('info', module, message, data, duration),
  };
}

export interface OperationTimer {
  /** End the timer and return duration */
  end(): number;
}

export function startOperationTimer(): OperationTimer {
  const startTime = Date.now();

  return {
    end: () => Date.now() - startTime,
  };
}
