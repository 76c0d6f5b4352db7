// MLX-VLM server: POST /generate, SSE streaming. The server reads image files itself.

import type { BackendRequest, GenerateOptions } from '../types.js';
import { mlxVlmWireFormat, type MlxVlmFrame } from '../wire/mlxVlm.js';
import { HttpBackend, type HttpBackendConfig } from './HttpBackend.js';

export interface MlxVlmGenerateBody {
  model: string;
  prompt: string;
  system?: string;
  stream: boolean;
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  seed?: number;
  image?: string[];
}

export class MlxVlmBackend extends HttpBackend<MlxVlmFrame, MlxVlmGenerateBody> {
  constructor(config: HttpBackendConfig) {
    super('mlx_vlm', mlxVlmWireFormat, config);
  }

  protected get generatePath(): string {
    return '/generate';
  }

  protected async buildBody(request: BackendRequest, options: GenerateOptions, stream: boolean): Promise<MlxVlmGenerateBody> {
    const body: MlxVlmGenerateBody = {
      model: this.model,
      prompt: request.prompt,
      stream,
    };

    if (request.systemPrompt) body.system = request.systemPrompt;
    const maxTokens = options.maxTokens ?? options.numCtx;
    if (maxTokens !== undefined) body.max_tokens = maxTokens;
    if (options.temperature !== undefined) body.temperature = options.temperature;
    if (options.topP !== undefined) body.top_p = options.topP;
    if (options.seed !== undefined) body.seed = options.seed;
    if (options.images && options.images.length > 0) body.image = [...options.images];

    return body;
  }
}
