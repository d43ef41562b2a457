/**
 * Logger Service
 *
 * Centralized logging with consistent formatting and structured context.
 *
 * Usage:
 *   import { logger } from './services/logger';
 *   logger.info('operation', 'message', { context });
 *   logger.error('operation', 'message', { context }, error);
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  timestamp: string;
  operation: string;
  message: string;
  context?: LogContext;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Tests draaien standaard stil (alleen errors), tenzij LOG_LEVEL expliciet gezet is.
 */
function resolveMinLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (isLogLevel(configured)) return configured;
  return process.env.NODE_ENV === 'test' ? 'error' : 'info';
}

const CONSOLE_METHOD: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

const LEVEL_EMOJI: Record<LogLevel, string> = {
  debug: '🔍',
  info: '📋',
  warn: '⚠️',
  error: '❌',
};

function serializeError(error: Error): NonNullable<LogEntry['error']> {
  return { name: error.name, message: error.message, stack: error.stack };
}

export class LoggerService {
  private readonly pretty = process.env.NODE_ENV !== 'production';
  private minLevel: LogLevel = resolveMinLevel();

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  /**
   * Dev: één regel met emoji, context als JSON erachter. Productie: JSON lines.
   */
  format(entry: LogEntry): string {
    if (!this.pretty) {
      return JSON.stringify(entry);
    }

    const parts = [`${LEVEL_EMOJI[entry.level]} [${entry.operation}] ${entry.message}`];
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    let output = parts.join(' ');
    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      const frames = entry.level === 'error' ? entry.error.stack?.split('\n').slice(1, 4) : undefined;
      if (frames?.length) {
        output += `\n  ${frames.join('\n  ')}`;
      }
    }
    return output;
  }

  private log(level: LogLevel, operation: string, message: string, context?: LogContext, error?: Error): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      operation,
      message,
      context,
      error: error ? serializeError(error) : undefined,
    };

    CONSOLE_METHOD[level](this.format(entry));
  }

  debug(operation: string, message: string, context?: LogContext): void {
    this.log('debug', operation, message, context);
  }

  info(operation: string, message: string, context?: LogContext): void {
    this.log('info', operation, message, context);
  }

  warn(operation: string, message: string, context?: LogContext): void {
    this.log('warn', operation, message, context);
  }

  error(operation: string, message: string, context?: LogContext, error?: Error): void {
    this.log('error', operation, message, context, error);
  }

  /**
   * Shorthand for logging with request context
   */
  forRequest(requestId: string) {
    const operation = `req:${requestId}`;
    return {
      debug: (message: string, context?: LogContext) =>
        this.debug(operation, message, context),
      info: (message: string, context?: LogContext) =>
        this.info(operation, message, context),
      warn: (message: string, context?: LogContext) =>
        this.warn(operation, message, context),
      error: (message: string, context?: LogContext, error?: Error) =>
        this.error(operation, message, context, error),
    };
  }
}

// Singleton export
export const logger = new LoggerService();
