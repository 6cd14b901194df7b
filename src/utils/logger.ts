/**
 * Structured JSON logging
 */

import { sanitizeString } from './sanitize';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly context?: Record<string, unknown>;
  readonly error?: {
    readonly name: string;
    readonly message: string;
    readonly stack?: string;
  };
}

export interface LoggerOptions {
  readonly environment?: string;
  readonly minLevel?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3
};

function parseLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  return upper === 'INFO' || upper === 'WARN' || upper === 'ERROR' ? upper : 'DEBUG';
}

export class Logger {
  private readonly environment: string;
  private readonly minLevel: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.environment = options.environment ?? process.env.ENVIRONMENT ?? 'development';
    this.minLevel = options.minLevel ?? parseLevel(process.env.LOG_LEVEL);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('WARN', message, context);
  }

  /**
   * Log error message. Messages and stacks of `error` are sanitized.
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const errorInfo = error instanceof Error ? {
      name: error.name,
      message: sanitizeString(error.message),
      stack: error.stack ? sanitizeString(error.stack) : undefined
    } : error === undefined ? undefined : {
      name: 'NonError',
      message: sanitizeString(String(error))
    };

    this.log('ERROR', message, context, errorInfo);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: { name: string; message: string; stack?: string }
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { ...context, environment: this.environment },
      ...(error && { error })
    };

    console.log(JSON.stringify(entry));
  }
}

export const logger = new Logger();
