/**
 * Structured logging for job submission, polling and downloads
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

type ConsoleSink = (line: string) => void;

const SINKS: Record<LogLevel, ConsoleSink> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.debug(line),
  trace: (line) => console.debug(line),
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

/**
 * Writes `[ISO time] [LEVEL] message {context}` lines to the console,
 * dropping anything below the minimum level.
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(minLevel: LogLevel = 'info') {
    this.threshold = LOG_LEVEL_PRIORITY[minLevel];
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < this.threshold) {
      return;
    }
    const suffix = context ? ` ${JSON.stringify(context)}` : '';
    SINKS[level](`[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${suffix}`);
  }
}

/**
 * Discards everything; for callers that supply no logger and want silence
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  trace(_message: string, _context?: LogContext): void {}
}

/**
 * Log a failed stage of a job
 */
export function logError(logger: Logger, stage: string, error: unknown): void {
  const context: LogContext =
    error instanceof Error
      ? { stage, errorName: error.name, errorMessage: error.message }
      : { stage, errorMessage: String(error) };
  logger.error(`Job ${stage} failed`, context);
}
