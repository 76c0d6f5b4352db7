// Ollama native API: POST /api/generate, NDJSON streaming, model details via /api/show

import { ModelInfoSchema, toModelInfo } from '../modelInfo.js';
import type { BackendRequest, GenerateOptions, ModelInfo } from '../types.js';
import { ollamaWireFormat, type OllamaFrame } from '../wire/ollama.js';
import { HttpBackend, type HttpBackendConfig } from './HttpBackend.js';

export interface OllamaRequestOptions {
  temperature?: number;
  num_predict?: number;
  num_ctx?: number;
  top_p?: number;
  seed?: number;
}

export interface OllamaGenerateBody {
  model: string;
  prompt: string;
  system?: string;
  stream: boolean;
  options?: OllamaRequestOptions;
  images?: string[];
}

export class OllamaBackend extends HttpBackend<OllamaFrame, OllamaGenerateBody> {
  constructor(config: HttpBackendConfig) {
    super('ollama', ollamaWireFormat, config);
  }

  protected get generatePath(): string {
    return '/api/generate';
  }

  protected async buildBody(request: BackendRequest, options: GenerateOptions, stream: boolean): Promise<OllamaGenerateBody> {
    const body: OllamaGenerateBody = {
      model: this.model,
      prompt: request.prompt,
      stream,
    };

    if (request.systemPrompt) {
      body.system = request.systemPrompt;
    }

    const requestOptions = toOllamaOptions(options);
    if (requestOptions) {
      body.options = requestOptions;
    }

    if (options.images && options.images.length > 0) {
      body.images = await this.imageEncoder.encodeAll(options.images);
    }

    return body;
  }

  override supportsModelInfo(): boolean {
    return true;
  }

  /**
   * Fetch model details from /api/show. Lookup failures are logged and
   * reported as null so callers can continue without the summary.
   */
  override async getModelInfo(modelName: string = this.model): Promise<ModelInfo | null> {
    const endpoint = `${this.baseUrl}/api/show`;

    try {
      return await this.exchange(
        endpoint,
        { name: modelName },
        undefined,
        async (response) => {
          const result = ModelInfoSchema.safeParse(await response.json());
          if (!result.success) {
            this.logger.warn('Unexpected model info shape', { model: modelName, err: result.error.message });
            return null;
          }
          return toModelInfo(result.data);
        },
        { modelName },
      );
    } catch (error: unknown) {
      this.logger.warn('Model info lookup failed', {
        model: modelName,
        err: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}

function toOllamaOptions(options: GenerateOptions): OllamaRequestOptions | undefined {
  const mapped: OllamaRequestOptions = {};
  if (options.temperature !== undefined) mapped.temperature = options.temperature;
  if (options.maxTokens !== undefined) mapped.num_predict = options.maxTokens;
  if (options.numCtx !== undefined) mapped.num_ctx = options.numCtx;
  if (options.topP !== undefined) mapped.top_p = options.topP;
  if (options.seed !== undefined) mapped.seed = options.seed;
  return Object.keys(mapped).length > 0 ? mapped : undefined;
}
