/**
 * Layer 7: Telemetry
 *
 * Structured logging for the request lifecycle.
 */

export {
  Logger,
  getLogger,
  setLogger,
  createRequestLogger,
  formatPretty,
  isLogLevel,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
  type RequestLogContext,
} from './logger.ts';
