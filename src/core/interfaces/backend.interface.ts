// AIBackend - the contract agent loops, CLIs and pipelines program against

import type { BackendRequest, BackendType, ChunkHandler, GenerateOptions, ModelInfo, UnifiedResponse } from '../types.js';

export interface AIBackend {
  readonly type: BackendType;
  readonly baseUrl: string;
  readonly model: string;

  /**
   * Send one request. When `request.stream` is set, `onChunk` receives every
   * text fragment in arrival order before the promise resolves.
   */
  send(request: BackendRequest, onChunk?: ChunkHandler): Promise<UnifiedResponse>;

  generate(prompt: string, systemPrompt?: string, options?: GenerateOptions): Promise<UnifiedResponse>;

  generateStreaming(
    prompt: string,
    systemPrompt: string | undefined,
    options: GenerateOptions | undefined,
    onChunk: ChunkHandler,
  ): Promise<UnifiedResponse>;

  // null when the backend has no model info endpoint or the lookup failed
  getModelInfo(modelName?: string): Promise<ModelInfo | null>;

  supportsModelInfo(): boolean;

  // Aborts in-flight requests; later calls fail
  close(): void;
}
