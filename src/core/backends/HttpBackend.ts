// HttpBackend - shared request/response plumbing for all HTTP backends
// Subclasses supply the request body and the wire format; this class owns
// the fetch call, timeout, HTTP error mapping and stream decoding.

import type { AIBackend } from '../interfaces/backend.interface.js';
import type { BackendLogger } from '../interfaces/logger.interface.js';
import {
  BackendError,
  ConfigurationError,
  ImageEncodingError,
  InvalidResponseError,
  ModelNotFoundError,
  TransportError,
  isBackendError,
} from '../errors.js';
import { ImageEncoder } from '../imageEncoder.js';
import { ConsoleLogger, parseLogLevel } from '../loggers/console.logger.js';
import { decodeStream } from '../streamDecoder.js';
import {
  BACKENDS,
  DEFAULT_TIMEOUT_MS,
  type BackendRequest,
  type BackendType,
  type ChunkHandler,
  type GenerateOptions,
  type ModelInfo,
  type UnifiedResponse,
} from '../types.js';
import { validateGenerateOptions } from '../validation.js';
import type { WireFormat } from '../wire/types.js';

export interface HttpBackendConfig {
  baseUrl: string;
  model: string;
  timeoutMs?: number;
  logger?: BackendLogger;
  imageEncoder?: ImageEncoder;
}

export interface ExchangeOptions {
  modelName?: string;
  passThrough?: (error: unknown) => boolean;
}

export abstract class HttpBackend<TFrame, TBody> implements AIBackend {
  readonly type: BackendType;
  readonly baseUrl: string;
  readonly model: string;
  protected readonly timeoutMs: number;
  protected readonly logger: BackendLogger;
  protected readonly imageEncoder: ImageEncoder;
  protected readonly label: string;
  private readonly wireFormat: WireFormat<TFrame>;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  protected constructor(type: BackendType, wireFormat: WireFormat<TFrame>, config: HttpBackendConfig) {
    const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(`Request timeout must be a positive number of milliseconds, got ${timeoutMs}`, {
        backendType: type,
        endpoint: config.baseUrl,
      });
    }

    this.type = type;
    this.wireFormat = wireFormat;
    this.baseUrl = config.baseUrl;
    this.model = config.model;
    this.timeoutMs = timeoutMs;
    this.label = BACKENDS[type].label;
    this.logger = config.logger ?? new ConsoleLogger(`backend:${type}`, parseLogLevel(process.env.LOG_LEVEL));
    this.imageEncoder = config.imageEncoder ?? new ImageEncoder();

    this.logger.info('Initialized backend', { backend: type, baseUrl: this.baseUrl, model: this.model });
  }

  // Path appended to the base URL for generation requests
  protected abstract get generatePath(): string;

  // Build the backend-specific body. Image encoding happens here, before any network call.
  protected abstract buildBody(request: BackendRequest, options: GenerateOptions, stream: boolean): Promise<TBody>;

  async send(request: BackendRequest, onChunk?: ChunkHandler): Promise<UnifiedResponse> {
    const endpoint = `${this.baseUrl}${this.generatePath}`;
    const stream = request.stream ?? false;

    if (this.closed) {
      throw new TransportError(`${this.label} @ ${endpoint}: backend is closed`, this.context(endpoint));
    }
    if (request.prompt.trim().length === 0) {
      throw new ConfigurationError(`${this.label}: prompt must not be blank`, this.context(endpoint));
    }

    const options = validateGenerateOptions(request.options);
    const body = await this.buildBodyFor(request, options, stream, endpoint);

    this.logger.debug('Sending request', { backend: this.type, endpoint, stream, model: this.model });

    // Errors raised by the caller's own handler are not transport failures
    let handlerFailure: { error: unknown } | undefined;
    const sink: ChunkHandler | undefined =
      onChunk &&
      ((chunk) => {
        try {
          onChunk(chunk);
        } catch (error: unknown) {
          handlerFailure = { error };
          throw error;
        }
      });

    const isHandlerError = (error: unknown): boolean => handlerFailure !== undefined && handlerFailure.error === error;

    return this.exchange(endpoint, body, request.signal, async (response) => {
      if (!stream) {
        return this.parseBody(response, endpoint);
      }
      if (!response.body) {
        throw new InvalidResponseError(`${this.label}: no response body for streaming`, response.status, this.context(endpoint));
      }
      return decodeStream(response.body, this.wireFormat, {
        model: this.model,
        onChunk: sink,
        logger: this.logger,
        backendType: this.type,
        endpoint,
      });
    }, { passThrough: isHandlerError });
  }

  generate(prompt: string, systemPrompt?: string, options?: GenerateOptions): Promise<UnifiedResponse> {
    return this.send({ prompt, systemPrompt, options, stream: false });
  }

  generateStreaming(
    prompt: string,
    systemPrompt: string | undefined,
    options: GenerateOptions | undefined,
    onChunk: ChunkHandler,
  ): Promise<UnifiedResponse> {
    return this.send({ prompt, systemPrompt, options, stream: true }, onChunk);
  }

  async getModelInfo(_modelName?: string): Promise<ModelInfo | null> {
    return null;
  }

  supportsModelInfo(): boolean {
    return false;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.logger.info('Closing backend', { backend: this.type, inFlight: this.inFlight.size });
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  protected context(endpoint: string): { backendType: BackendType; endpoint: string } {
    return { backendType: this.type, endpoint };
  }

  /**
   * POST a JSON body and hand the successful response to `handle`.
   * The timeout covers the whole exchange, including reading a streamed body.
   * `modelName` is the model a 404 refers to; errors matching `passThrough`
   * are rethrown as they are instead of being wrapped.
   */
  protected async exchange<T>(
    endpoint: string,
    body: unknown,
    signal: AbortSignal | undefined,
    handle: (response: Response) => Promise<T>,
    options: ExchangeOptions = {},
  ): Promise<T> {
    const modelName = options.modelName ?? this.model;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();

    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });
    this.inFlight.add(controller);

    try {
      const response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      this.logger.debug('Received response', { backend: this.type, status: response.status });

      if (!response.ok) {
        await this.handleHttpError(response, endpoint, modelName);
      }

      return await handle(response);
    } catch (error: unknown) {
      // Drop the connection; nothing more will be read from it
      controller.abort();
      if (options.passThrough?.(error)) throw error;
      throw this.wrapError(error, endpoint, timedOut);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
      this.inFlight.delete(controller);
    }
  }

  protected async handleHttpError(response: Response, endpoint: string, modelName: string): Promise<never> {
    const errorText = (await response.text()).substring(0, 300);
    const context = this.context(endpoint);

    if (response.status === 404) {
      throw new ModelNotFoundError(modelName, context);
    }
    if (response.status >= 500) {
      throw new TransportError(`${this.label} @ ${endpoint}: server error HTTP ${response.status} - ${errorText}`, context);
    }
    throw new InvalidResponseError(`${this.label}: unexpected response - ${errorText}`, response.status, context);
  }

  protected wrapError(error: unknown, endpoint: string, timedOut: boolean): BackendError {
    const context = this.context(endpoint);

    if (timedOut) {
      return new TransportError(`${this.label} @ ${endpoint}: request timeout after ${this.timeoutMs}ms`, {
        ...context,
        timedOut: true,
        cause: error,
      });
    }
    if (isBackendError(error)) {
      return error;
    }

    const reason = describeCause(error);
    this.logger.error('Request failed', { backend: this.type, endpoint, err: reason });
    return new TransportError(`${this.label} @ ${endpoint}: ${this.closed ? 'backend closed' : reason}`, {
      ...context,
      cause: error,
    });
  }

  private async buildBodyFor(
    request: BackendRequest,
    options: GenerateOptions,
    stream: boolean,
    endpoint: string,
  ): Promise<TBody> {
    try {
      return await this.buildBody(request, options, stream);
    } catch (error: unknown) {
      if (error instanceof ImageEncodingError) {
        throw new ImageEncodingError(error.message, error.path, { ...this.context(endpoint), cause: error.cause });
      }
      throw error;
    }
  }

  private async parseBody(response: Response, endpoint: string): Promise<UnifiedResponse> {
    const raw = await response.text();
    const context = this.context(endpoint);

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error: unknown) {
      throw new InvalidResponseError(`${this.label}: invalid JSON response`, response.status, { ...context, cause: error });
    }

    const result = this.wireFormat.schema.safeParse(json);
    if (!result.success) {
      throw new InvalidResponseError(
        `${this.label}: unexpected response shape (${result.error.issues[0]?.message ?? 'invalid'})`,
        response.status,
        { ...context, cause: result.error },
      );
    }

    return this.wireFormat.toUnified(result.data, this.model);
  }
}

// fetch reports connection failures as "fetch failed" with the socket error as cause
function describeCause(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (error.cause instanceof Error) return `${error.message} (${error.cause.message})`;
  return error.message;
}
