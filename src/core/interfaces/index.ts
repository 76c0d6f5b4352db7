export type { BackendLogger, BackendLoggerFactory } from './logger.interface.js';
export type { AIBackend } from './backend.interface.js';
