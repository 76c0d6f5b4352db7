export { ConsoleLogger, ConsoleLoggerFactory, parseLogLevel } from './console.logger.js';
export type { LogLevel } from './console.logger.js';
export { PinoLogger, PinoLoggerFactory } from './pino.logger.js';
