/**
 * Logger
 *
 * Module-level logger shared by the caching layer. Call sites pass the
 * message first and an optional context object second; records are written
 * as JSON lines through pino.
 */

import { pino, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type LogContext = Record<string, unknown>;

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Resolve a level name, falling back to the default for unknown values
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

export class Logger {
  constructor(private readonly base: PinoLogger) {}

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  child(bindings: LogContext): Logger {
    return new Logger(this.base.child(bindings));
  }

  get level(): string {
    return this.base.level;
  }

  setLevel(level: LogLevel): void {
    this.base.level = level;
  }

  private write(level: 'debug' | 'info' | 'warn' | 'error', message: string, context?: LogContext): void {
    if (context) {
      this.base[level](context, message);
    } else {
      this.base[level](message);
    }
  }
}

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return new Logger(
    pino({
      name: options.name ?? 'context-cache',
      level: options.level ?? resolveLogLevel(process.env.CONTEXT_CACHE_LOG_LEVEL),
    })
  );
}

export const logger = createLogger();
