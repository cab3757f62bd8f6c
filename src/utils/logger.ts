/**
 * Structured logging utility
 * Logs include request IDs, timestamps, and avoid leaking secrets
 */

export interface LogContext {
  requestId?: string;
  [key: string]: unknown;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levelRank;
}

class Logger {
  private level: LogLevel | null = null;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  // Resolved lazily so LOG_LEVEL from .env is honoured after dotenv runs
  private currentLevel(): LogLevel {
    if (this.level) return this.level;
    const fromEnv = (process.env.LOG_LEVEL || '').toLowerCase();
    if (isLogLevel(fromEnv)) return fromEnv;
    return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
  }

  private enabled(level: LogLevel): boolean {
    return levelRank[level] >= levelRank[this.currentLevel()];
  }

  private sanitize(obj: unknown): unknown {
    if (typeof obj !== 'object' || obj === null) {
      return obj;
    }

    if (Array.isArray(obj)) {
      return obj.map((item) => this.sanitize(item));
    }

    const sanitized: Record<string, unknown> = {};
    const secretKeys = ['password', 'token', 'key', 'secret', 'apikey', 'api_key', 'authorization'];

    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      if (secretKeys.some((secret) => lowerKey.includes(secret))) {
        sanitized[key] = '[REDACTED]';
      } else if (typeof value === 'object' && value !== null) {
        sanitized[key] = this.sanitize(value);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? JSON.stringify(this.sanitize(context)) : '';
    return `[${timestamp}] [${level}] ${message} ${contextStr}`.trimEnd();
  }

  info(message: string, context?: LogContext): void {
    if (!this.enabled('info')) return;
    console.log(this.formatMessage('INFO', message, context));
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (!this.enabled('error')) return;
    const errorContext = {
      ...context,
      error: error instanceof Error ? {
        message: error.message,
        stack: error.stack,
        name: error.name
      } : error
    };
    console.error(this.formatMessage('ERROR', message, errorContext));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.enabled('warn')) return;
    console.warn(this.formatMessage('WARN', message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (!this.enabled('debug')) return;
    console.debug(this.formatMessage('DEBUG', message, context));
  }
}

export const logger = new Logger();
