/**
 * Structured Logging
 *
 * Leveled logger with bound context. Every request gets a child logger
 * carrying its request id, controller and action.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private readonly format: LogFormat;
  private readonly context: Record<string, unknown>;
  private readonly output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? ((entry) => this.write(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger sharing level, format and output, with extra context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.output(entry);
  }

  private write(entry: LogEntry): void {
    const stream = entry.level === 'error' || entry.level === 'warn' ? process.stderr : process.stdout;

    if (this.format === 'json') {
      stream.write(JSON.stringify(entry) + '\n');
      return;
    }

    stream.write(formatPretty(entry) + '\n');
  }
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

/**
 * Render an entry for a development terminal
 */
export function formatPretty(entry: LogEntry): string {
  const timestamp = DIM + entry.timestamp + RESET;
  const level = COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;

  let line = `${timestamp} ${level} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${DIM}${JSON.stringify(entry.context)}${RESET}`;
  }

  if (entry.error?.stack) {
    line += `\n${DIM}${entry.error.stack}${RESET}`;
  }

  return line;
}

export interface RequestLogContext {
  requestId: string;
  method: string;
  path: string;
  controller?: string;
  action?: string;
}

/**
 * Bind request identity to a logger
 */
export function createRequestLogger(baseLogger: Logger, context: RequestLogContext): Logger {
  const bound: Record<string, unknown> = {
    requestId: context.requestId,
    method: context.method,
    path: context.path,
  };
  if (context.controller) bound.controller = context.controller;
  if (context.action) bound.action = context.action;
  return baseLogger.child(bound);
}

let defaultLogger: Logger | null = null;

/**
 * Process-wide logger, configured from NODE_ENV and LOG_LEVEL on first use
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const production = process.env.NODE_ENV === 'production';
    const envLevel = process.env.LOG_LEVEL;
    defaultLogger = new Logger({
      level: isLogLevel(envLevel) ? envLevel : production ? 'info' : 'debug',
      format: production ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
