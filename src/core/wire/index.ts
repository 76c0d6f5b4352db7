// Wire formats as a tagged union, one adapter per variant

import type { UnifiedResponse } from '../types.js';
import { fromMlxVlmFrame, type MlxVlmFrame } from './mlxVlm.js';
import { fromOllamaFrame, type OllamaFrame } from './ollama.js';
import { fromOpenAIFrame, type OpenAIChatFrame } from './openai.js';

export type WireFrame =
  | { format: 'ollama'; frame: OllamaFrame }
  | { format: 'openai'; frame: OpenAIChatFrame }
  | { format: 'mlx_vlm'; frame: MlxVlmFrame };

export function toUnifiedResponse(wire: WireFrame, fallbackModel: string): UnifiedResponse {
  switch (wire.format) {
    case 'ollama':
      return fromOllamaFrame(wire.frame, fallbackModel);
    case 'openai':
      return fromOpenAIFrame(wire.frame, fallbackModel);
    case 'mlx_vlm':
      return fromMlxVlmFrame(wire.frame, fallbackModel);
  }
}

export * from './types.js';
export * from './ollama.js';
export * from './openai.js';
export * from './mlxVlm.js';
