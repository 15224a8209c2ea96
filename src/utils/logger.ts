import type { LogLevel } from '../schemas/config.schema.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

/**
 * Destination for formatted log lines. `stream` is `stderr` for warnings
 * and errors so the report progress on stdout stays clean.
 */
export type LogSink = (line: string, stream: 'stdout' | 'stderr') => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const consoleSink: LogSink = (line, stream) => {
  if (stream === 'stderr') {
    console.error(line);
  } else {
    console.log(line);
  }
};

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

/**
 * Levelled logger. Messages are written as-is; `data` is appended as JSON.
 */
export class Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly sink: LogSink = consoleSink,
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  /** A logger with the same sink at a different level. */
  withLevel(level: LogLevel): Logger {
    return new Logger(level, this.sink);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const suffix = data ? ` ${JSON.stringify(data)}` : '';
    const stream = level === 'warn' || level === 'error' ? 'stderr' : 'stdout';
    this.sink(`${message}${suffix}`, stream);
  }
}

/**
 * Logger that records lines in memory, for tests and for callers that
 * want to inspect progress after a run.
 */
export function createMemoryLogger(level: LogLevel = 'debug'): {
  logger: Logger;
  lines: Array<{ line: string; stream: 'stdout' | 'stderr' }>;
} {
  const lines: Array<{ line: string; stream: 'stdout' | 'stderr' }> = [];
  const logger = new Logger(level, (line, stream) => {
    lines.push({ line, stream });
  });
  return { logger, lines };
}
