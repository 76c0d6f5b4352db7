// ConsoleLogger - fallback logger used when no logger is injected
// Writes one line per entry to the console, no dependencies

import type { BackendLogger, BackendLoggerFactory } from '../interfaces/logger.interface.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const match = LEVELS.find((level) => level === value?.toLowerCase());
  return match ?? fallback;
}

export class ConsoleLogger implements BackendLogger {
  private context: string;
  private level: LogLevel;

  constructor(context: string = 'backend', level: LogLevel = 'info') {
    this.context = context;
    this.level = level;
  }

  private shouldLog(msgLevel: Exclude<LogLevel, 'silent'>): boolean {
    return LEVELS.indexOf(msgLevel) >= LEVELS.indexOf(this.level);
  }

  private formatMessage(level: string, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}${contextStr}`;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage('debug', message, context));
    }
  }

  log(message: string, context?: Record<string, unknown>): void {
    this.info(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, context));
    }
  }
}

export class ConsoleLoggerFactory implements BackendLoggerFactory {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
  }

  createLogger(context: string): BackendLogger {
    return new ConsoleLogger(context, this.level);
  }
}
