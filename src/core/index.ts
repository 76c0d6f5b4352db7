// Core module exports

// Backends
export { createBackend } from './backendFactory.js';
export type { CreateBackendOptions } from './backendFactory.js';
export { HttpBackend } from './backends/HttpBackend.js';
export type { ExchangeOptions, HttpBackendConfig } from './backends/HttpBackend.js';
export { OllamaBackend } from './backends/OllamaBackend.js';
export { LMStudioBackend } from './backends/LMStudioBackend.js';
export { MlxVlmBackend } from './backends/MlxVlmBackend.js';

// Streaming and wire formats
export * from './streamDecoder.js';
export * from './wire/index.js';

// Configuration
export { createConfigSource, resolveBaseUrl } from './endpointResolver.js';
export * from './validation.js';

// Helpers
export * from './imageEncoder.js';
export * from './modelInfo.js';
export * from './timing.js';

// Types
export * from './types.js';
export * from './errors.js';

// Interfaces
export * from './interfaces/index.js';

// Loggers
export * from './loggers/index.js';
