/**
 * Structured logging utilities
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json' | 'compact';

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
  /** Sink for formatted lines; defaults to `console.error` so stdout stays clean. */
  write: (line: string) => void;
}

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Creates a default logging configuration
 */
export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'pretty',
    includeTimestamps: true,
    write: (line) => console.error(line),
  };
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Returns the log level named by `value`, or `fallback` when it names none.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private config: LoggingConfig;

  constructor(config?: Partial<LoggingConfig>) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
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

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const timestamp = this.config.includeTimestamps ? new Date().toISOString() : undefined;

    if (this.config.format === 'json') {
      this.config.write(JSON.stringify({ timestamp, level, message, ...context }));
    } else if (this.config.format === 'compact') {
      const contextStr = context ? ` ${JSON.stringify(context)}` : '';
      this.config.write(`[${level.toUpperCase()}] ${message}${contextStr}`);
    } else {
      const parts: string[] = [];
      if (timestamp) parts.push(`[${timestamp}]`);
      parts.push(`[${level.toUpperCase()}]`);
      parts.push(message);
      if (context) {
        parts.push('\n  ' + Object.entries(context)
          .map(([k, v]) => `${k}: ${JSON.stringify(v)}`)
          .join('\n  '));
      }
      this.config.write(parts.join(' '));
    }
  }
}

/**
 * No-op logger, the default when no logger is supplied
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

/**
 * Builds a console logger from `LOG_LEVEL` and `LOG_FORMAT`.
 */
export function createLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): Logger {
  const format = env.LOG_FORMAT === 'json' || env.LOG_FORMAT === 'compact' ? env.LOG_FORMAT : 'pretty';
  return new ConsoleLogger({ level: parseLogLevel(env.LOG_LEVEL), format });
}

/**
 * Logs an error with context
 */
export function logError(
  logger: Logger,
  error: Error,
  context: string
): void {
  logger.error('Error occurred', {
    context,
    errorName: error.name,
    errorMessage: error.message,
  });
}
