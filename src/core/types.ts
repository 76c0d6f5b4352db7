// Core types for the LLM backend bridge

export type BackendType = 'ollama' | 'lmstudio' | 'mlx_vlm';

// How a backend frames a streamed response body
export type StreamFraming = 'ndjson' | 'sse';

export interface BackendDefinition {
  label: string;
  configKey: string; // property-style lookup key
  envKey: string; // environment variable
  fallbackUrl: string;
  framing: StreamFraming;
}

// Supported backends and where their base URL comes from
export const BACKENDS: Readonly<Record<BackendType, BackendDefinition>> = {
  ollama: {
    label: 'Ollama',
    configKey: 'ollama.base.url',
    envKey: 'OLLAMA_BASE_URL',
    fallbackUrl: 'http://localhost:11434',
    framing: 'ndjson',
  },
  lmstudio: {
    label: 'LM Studio',
    configKey: 'lmstudio.base.url',
    envKey: 'LMSTUDIO_BASE_URL',
    fallbackUrl: 'http://localhost:1234/v1',
    framing: 'sse',
  },
  mlx_vlm: {
    label: 'MLX-VLM',
    configKey: 'mlx.vlm.base.url',
    envKey: 'MLX_VLM_BASE_URL',
    fallbackUrl: 'http://localhost:8000',
    framing: 'sse',
  },
};

export const BACKEND_TYPES: readonly BackendType[] = ['ollama', 'lmstudio', 'mlx_vlm'];

// Normalized result every backend produces.
// Durations are nanoseconds; undefined means the backend did not report it.
export interface UnifiedResponse {
  readonly model: string;
  readonly text: string;
  readonly done: boolean;
  readonly totalDurationNanos?: number;
  readonly promptEvalDurationNanos?: number;
  readonly promptEvalCount?: number;
  readonly evalDurationNanos?: number;
  readonly evalCount?: number;
}

// Generation options shared by all backends
export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
  numCtx?: number; // context window (Ollama)
  topP?: number;
  seed?: number;
  images?: string[]; // local paths or http(s) URLs
}

export interface BackendRequest {
  prompt: string;
  systemPrompt?: string;
  options?: GenerateOptions;
  stream?: boolean;
  signal?: AbortSignal;
}

export type ChunkHandler = (text: string) => void;

// OpenAI-style chat message used by the LM Studio client
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string | ContentPart[];
}

export type ContentPart = { type: 'text'; text: string } | { type: 'image_url'; image_url: { url: string } };

export interface ModelDetails {
  parentModel?: string;
  format?: string;
  family?: string;
  families?: string[];
  parameterSize?: string;
  quantizationLevel?: string;
}

// Model metadata from Ollama's /api/show
export interface ModelInfo {
  modelfile?: string;
  parameters?: string;
  template?: string;
  details?: ModelDetails;
  modelInfo?: Record<string, unknown>;
}

// Reads an image attachment from disk
export type ImageReader = (path: string) => Promise<Uint8Array>;

// Lookup capability for endpoint overrides
export interface ConfigSource {
  getConfig(key: string): string | undefined;
  getEnv(key: string): string | undefined;
}

export const DEFAULT_MODEL = 'gemma3';
export const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;
