/**
 * Structured logger.
 *
 * One line per entry: JSON when `NODE_ENV=production` (for log collectors),
 * otherwise a readable `[LEVEL] [service] message` line. Warnings and errors go
 * to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext, error?: Error): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase();
  return LEVELS.find((l) => l === level) ?? 'info';
}

export function createLogger(
  service: string,
  minLevel: LogLevel = 'info'
): Logger {
  function shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(minLevel);
  }

  function format(entry: LogEntry): string {
    if (process.env.NODE_ENV === 'production') {
      return JSON.stringify(entry);
    }

    let line = `[${entry.level.toUpperCase()}] [${entry.service}] ${entry.message}`;
    if (entry.error) line += `: ${entry.error.message}`;
    if (entry.context && Object.keys(entry.context).length > 0) {
      line += ` ${JSON.stringify(entry.context)}`;
    }
    if (entry.error?.stack) line += `\n${entry.error.stack}`;
    return line;
  }

  function log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error
  ): void {
    if (!shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service,
      message,
      context,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack:
          process.env.NODE_ENV === 'development' ? error.stack : undefined,
      };
    }

    const line = format(entry);
    if (level === 'warn' || level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context, error) => log('warn', message, context, error),
    error: (message, context, error) => log('error', message, context, error),
  };
}

export const logger = createLogger('ddns', parseLogLevel(process.env.LOG_LEVEL));
