// PinoLogger - BackendLogger backed by pino
// Pretty-prints to stderr outside production, raw JSON lines otherwise

import pino from 'pino';
import type { BackendLogger, BackendLoggerFactory } from '../interfaces/logger.interface.js';
import { parseLogLevel, type LogLevel } from './console.logger.js';

type PinoMethod = 'debug' | 'info' | 'warn' | 'error';

export class PinoLogger implements BackendLogger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger) {
    this.logger = logger;
  }

  private write(method: PinoMethod, message: string, context?: Record<string, unknown>): void {
    this.logger[method](context ?? {}, message);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  log(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }
}

export interface PinoLoggerFactoryOptions {
  /** Defaults to LOG_LEVEL, then info. */
  level?: LogLevel;
  /** Defaults to true unless NODE_ENV is production. Ignored when a destination is given. */
  pretty?: boolean;
  destination?: pino.DestinationStream;
}

export class PinoLoggerFactory implements BackendLoggerFactory {
  private baseLogger: pino.Logger;

  constructor(options: PinoLoggerFactoryOptions = {}) {
    const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
    const pretty = options.pretty ?? process.env.NODE_ENV !== 'production';

    if (options.destination) {
      this.baseLogger = pino({ level }, options.destination);
    } else if (pretty && level !== 'silent') {
      this.baseLogger = pino({
        level,
        transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
      });
    } else {
      this.baseLogger = pino({ level }, pino.destination(2));
    }
  }

  createLogger(context: string): BackendLogger {
    return new PinoLogger(this.baseLogger.child({ context }));
  }
}
