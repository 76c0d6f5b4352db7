// Typed failures raised by backend clients
// Every error carries the backend it came from and the endpoint it targeted

import type { BackendType } from './types.js';

export interface BackendErrorDetails {
  backendType?: BackendType;
  endpoint?: string;
  cause?: unknown;
}

export class BackendError extends Error {
  public override readonly name: string = 'BackendError';
  public readonly backendType?: BackendType;
  public readonly endpoint?: string;

  constructor(message: string, details: BackendErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.backendType = details.backendType;
    this.endpoint = details.endpoint;
  }
}

// No usable endpoint or invalid client configuration
export class ConfigurationError extends BackendError {
  public override readonly name = 'ConfigurationError';
}

// Connection refused, reset, timed out or aborted
export class TransportError extends BackendError {
  public override readonly name = 'TransportError';
  public readonly timedOut: boolean;

  constructor(message: string, details: BackendErrorDetails & { timedOut?: boolean } = {}) {
    super(message, details);
    this.timedOut = details.timedOut ?? false;
  }
}

// One streamed frame could not be parsed; the decoder skips it
export class FrameParseError extends BackendError {
  public override readonly name = 'FrameParseError';
  public readonly payload: string;

  constructor(message: string, payload: string, details: BackendErrorDetails = {}) {
    super(message, details);
    this.payload = payload;
  }
}

// An image attachment could not be read or is not an accepted format
export class ImageEncodingError extends BackendError {
  public override readonly name = 'ImageEncodingError';
  public readonly path: string;

  constructor(message: string, path: string, details: BackendErrorDetails = {}) {
    super(message, details);
    this.path = path;
  }
}

export class UnsupportedBackendError extends BackendError {
  public override readonly name = 'UnsupportedBackendError';
  public readonly requested: string;

  constructor(requested: string) {
    super(`Unsupported backend: "${requested}"`);
    this.requested = requested;
  }
}

export class ModelNotFoundError extends BackendError {
  public override readonly name = 'ModelNotFoundError';
  public readonly modelName: string;

  constructor(modelName: string, details: BackendErrorDetails = {}) {
    super(`Model not found: ${modelName}`, details);
    this.modelName = modelName;
  }
}

// Unexpected HTTP status, or a body that does not match the backend's format
export class InvalidResponseError extends BackendError {
  public override readonly name = 'InvalidResponseError';
  public readonly statusCode: number;

  constructor(message: string, statusCode: number, details: BackendErrorDetails = {}) {
    super(`${message} (HTTP ${statusCode})`, details);
    this.statusCode = statusCode;
  }
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}
