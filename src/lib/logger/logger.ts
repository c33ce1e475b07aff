/**
 * Centralized Logger
 *
 * Structured, level-filtered logging for the filter engine and the job
 * worker. Every message is passed through the redactor before output.
 */

import { sanitizeLogMessage } from './redact';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Service or module name */
  service?: string;
  /** Run ID for tracing a single filter job */
  runId?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  data?: unknown;
}

/**
 * Get the current log level from environment
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel === 'debug' || envLevel === 'info' || envLevel === 'warn' || envLevel === 'error') {
    return envLevel;
  }
  // Default to 'debug' in development, 'info' in production
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Log level priority for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Check if a log level should be output
 */
export function shouldLog(level: LogLevel): boolean {
  const currentLevel = getLogLevel();
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLevel];
}

/**
 * Format error for logging
 * Handles both Error instances and plain objects/values
 */
export function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined;

  if (error instanceof Error) {
    return {
      name: error.name,
      message: sanitizeLogMessage(error.message),
      stack: error.stack ? sanitizeLogMessage(error.stack) : undefined,
    };
  }

  if (typeof error === 'object') {
    const message = 'message' in error ? error.message : undefined;
    const name = 'name' in error ? error.name : undefined;
    return {
      name: typeof name === 'string' ? name : 'UnknownError',
      message: sanitizeLogMessage(
        typeof message === 'string' ? message : JSON.stringify(error)
      ),
    };
  }

  return {
    name: 'UnknownError',
    message: sanitizeLogMessage(String(error)),
  };
}

function sanitizeData(data: unknown): unknown {
  if (typeof data === 'string') {
    return sanitizeLogMessage(data);
  }
  if (Array.isArray(data)) {
    return data.map(sanitizeData);
  }
  if (data && typeof data === 'object' && !(data instanceof Error)) {
    return Object.fromEntries(
      Object.entries(data).map(([key, value]) => [key, sanitizeData(value)])
    );
  }
  return data;
}

/**
 * Create a log entry
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: unknown,
  data?: unknown
): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    message: sanitizeLogMessage(message),
    context,
    error: formatError(error),
    data: sanitizeData(data),
  };
}

/**
 * Output log entry to console
 */
function outputLog(entry: LogEntry): void {
  const contextStr = entry.context?.service ? `[${entry.context.service}]` : '';
  const runIdStr = entry.context?.runId ? `[run:${entry.context.runId}]` : '';

  const formattedMessage = `${entry.timestamp} ${entry.level.toUpperCase()} ${contextStr}${runIdStr} ${entry.message}`;

  const logArgs: unknown[] = [formattedMessage];

  if (entry.data !== undefined) {
    logArgs.push('\nData:', entry.data);
  }

  if (entry.error) {
    logArgs.push('\nError:', entry.error);
  }

  if (entry.context && Object.keys(entry.context).length > 0) {
    // service and runId are already in the prefix
    const { service: _service, runId: _runId, ...restContext } = entry.context;
    if (Object.keys(restContext).length > 0) {
      logArgs.push('\nContext:', restContext);
    }
  }

  switch (entry.level) {
    case 'debug':
      console.debug(...logArgs);
      break;
    case 'info':
      console.info(...logArgs);
      break;
    case 'warn':
      console.warn(...logArgs);
      break;
    case 'error':
      console.error(...logArgs);
      break;
  }
}

/**
 * Logger class for creating scoped loggers
 */
export class Logger {
  private context: LogContext;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({
      ...this.context,
      ...additionalContext,
    });
  }

  debug(message: string, data?: unknown): void {
    if (!shouldLog('debug')) return;
    outputLog(createLogEntry('debug', message, this.context, undefined, data));
  }

  info(message: string, data?: unknown): void {
    if (!shouldLog('info')) return;
    outputLog(createLogEntry('info', message, this.context, undefined, data));
  }

  warn(message: string, data?: unknown): void {
    if (!shouldLog('warn')) return;
    outputLog(createLogEntry('warn', message, this.context, undefined, data));
  }

  error(message: string, error?: unknown, data?: unknown): void {
    if (!shouldLog('error')) return;
    outputLog(createLogEntry('error', message, this.context, error, data));
  }

  /**
   * Log an async operation with timing
   */
  async withTiming<T>(operationName: string, fn: () => Promise<T>, data?: unknown): Promise<T> {
    const startTime = Date.now();
    this.debug(`Starting: ${operationName}`, data);
    try {
      const result = await fn();
      this.info(`Completed: ${operationName}`, { duration: `${Date.now() - startTime}ms` });
      return result;
    } catch (error) {
      this.error(`Failed: ${operationName}`, error, data);
      throw error;
    }
  }
}

/**
 * Create a logger for a specific service
 */
export function createLogger(service: string): Logger {
  return new Logger({ service });
}

/**
 * Generate a unique run ID
 */
export function generateRunId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 9)}`;
}
