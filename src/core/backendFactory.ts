// Backend factory - picks the client for a backend type and resolves its endpoint

import type { AIBackend } from './interfaces/backend.interface.js';
import type { BackendLogger } from './interfaces/logger.interface.js';
import { LMStudioBackend } from './backends/LMStudioBackend.js';
import { MlxVlmBackend } from './backends/MlxVlmBackend.js';
import { OllamaBackend } from './backends/OllamaBackend.js';
import type { HttpBackendConfig } from './backends/HttpBackend.js';
import { resolveBaseUrl } from './endpointResolver.js';
import { UnsupportedBackendError } from './errors.js';
import { ImageEncoder } from './imageEncoder.js';
import { DEFAULT_MODEL, type ConfigSource, type ImageReader } from './types.js';
import { parseBackendType } from './validation.js';

export interface CreateBackendOptions {
  // Backend name; case and `-`/`_` are ignored, e.g. "LMStudio", "mlx-vlm"
  type: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  logger?: BackendLogger;
  configSource?: ConfigSource;
  readImage?: ImageReader;
}

/**
 * Create a backend client.
 * @throws UnsupportedBackendError for unknown backend names
 * @throws ConfigurationError for a non-positive timeout
 */
export function createBackend(options: CreateBackendOptions): AIBackend {
  const type = parseBackendType(options.type);
  if (type === null) {
    throw new UnsupportedBackendError(options.type);
  }

  const config: HttpBackendConfig = {
    baseUrl: resolveBaseUrl(type, options.baseUrl, options.configSource),
    model: options.model?.trim() || DEFAULT_MODEL,
    timeoutMs: options.timeoutMs,
    logger: options.logger,
    imageEncoder: options.readImage ? new ImageEncoder(options.readImage) : undefined,
  };

  switch (type) {
    case 'ollama':
      return new OllamaBackend(config);
    case 'lmstudio':
      return new LMStudioBackend(config);
    case 'mlx_vlm':
      return new MlxVlmBackend(config);
  }
}
