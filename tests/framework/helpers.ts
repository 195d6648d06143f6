/**
 * Shared test helpers
 */

import { Context, type ContextOptions } from '../../framework/http/context.ts';
import { Logger, type LogEntry, type LogLevel } from '../../framework/telemetry/logger.ts';

export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({
    level,
    output: (entry) => {
      entries.push(entry);
    },
  });
  return { logger, entries };
}

/**
 * Context with a logger that keeps its output to itself
 */
export function createTestContext(options: ContextOptions = {}): Context {
  return new Context({ logger: captureLogger().logger, ...options });
}
