/**
 * Logger Module
 *
 * Centralized, redacting logging for the filter engine and worker.
 */

export {
  Logger,
  createLogger,
  generateRunId,
  type LogLevel,
  type LogContext,
  type LogEntry,
} from './logger';

export { sanitizeLogMessage, maskUrl, maskValue } from './redact';
