/**
 * Logger utility for structured, level-based logging
 * Everything goes to stderr: stdout carries the stdio MCP protocol
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  TRACE = 4,
}

const REDACTED_KEYS = new Set(['token', 'authorization', 'auth_token']);

export class Logger {
  private static instance: Logger;
  private level: LogLevel;
  private enableTimestamp: boolean;

  private constructor() {
    const levelStr = (process.env.VIKUNJA_LOG_LEVEL || 'info').toLowerCase();
    this.level = Logger.parseLevel(levelStr);
    this.enableTimestamp = true;
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  static parseLevel(level: string): LogLevel {
    switch (level) {
      case 'error':
        return LogLevel.ERROR;
      case 'warn':
        return LogLevel.WARN;
      case 'info':
        return LogLevel.INFO;
      case 'debug':
        return LogLevel.DEBUG;
      case 'trace':
        return LogLevel.TRACE;
      default:
        return LogLevel.INFO;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  shouldLog(level: LogLevel): boolean {
    return level <= this.level;
  }

  private formatMessage(level: string, message: string, context?: unknown): string {
    const timestamp = this.enableTimestamp ? `[${new Date().toISOString()}]` : '';
    const prefix = `${timestamp} ${level}:`;

    if (context === undefined) {
      return `${prefix} ${message}`;
    }

    const contextStr =
      typeof context === 'string' ? context : JSON.stringify(context, null, 2);

    return `${prefix} ${message}\n${contextStr}`;
  }

  error(message: string, context?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage('ERROR', message, context));
    }
  }

  warn(message: string, context?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.error(this.formatMessage('WARN', message, context));
    }
  }

  info(message: string, context?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.error(this.formatMessage('INFO', message, context));
    }
  }

  debug(message: string, context?: unknown): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.error(this.formatMessage('DEBUG', message, context));
    }
  }

  trace(message: string, context?: unknown): void {
    if (this.shouldLog(LogLevel.TRACE)) {
      console.error(this.formatMessage('TRACE', message, context));
    }
  }

  // Specialized helper methods

  logRemoteCall(method: string, endpoint: string, instance: string): void {
    if (this.shouldLog(LogLevel.TRACE)) {
      this.trace('Vikunja request', { method, endpoint, instance });
    }
  }

  logToolCall(name: string, args: unknown): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.debug(`Tool call: ${name}`, { args: this.sanitizeArgs(args) });
    }
  }

  logToolResult(name: string, result: unknown, duration?: number): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      const context: Record<string, unknown> = {};

      if (duration !== undefined) {
        context.duration = `${duration}ms`;
      }

      if (this.shouldLog(LogLevel.TRACE)) {
        context.result = result;
      }

      this.debug(`Tool result: ${name}`, context);
    }
  }

  logToolError(name: string, error: Error, args?: unknown, duration?: number): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.error(`Tool error: ${name}`, {
        error: error.message,
        stack: error.stack,
        args: this.sanitizeArgs(args),
        duration: duration !== undefined ? `${duration}ms` : undefined,
      });
    }
  }

  sanitizeArgs(args: unknown): unknown {
    if (typeof args !== 'object' || args === null) {
      return args;
    }

    if (Array.isArray(args)) {
      return `[Array: ${args.length} items]`;
    }

    return Object.entries(args).reduce<Record<string, unknown>>((acc, [key, value]) => {
      if (REDACTED_KEYS.has(key.toLowerCase())) {
        acc[key] = '[redacted]';
      } else if (typeof value === 'object' && value !== null) {
        acc[key] = Array.isArray(value) ? `[Array: ${value.length} items]` : '[Object]';
      } else {
        acc[key] = value;
      }
      return acc;
    }, {});
  }
}

export const logger = Logger.getInstance();
