// BackendLogger - logger capability injected into every component
// Lets callers plug in pino, console, or a test double

export interface BackendLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  log(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

// Factory type for creating child loggers with context
export interface BackendLoggerFactory {
  createLogger(context: string): BackendLogger;
}
