// MLX-VLM format: POST /generate; full bodies carry `text`, SSE chunks carry `chunk`

import { z } from 'zod';
import type { UnifiedResponse } from '../types.js';
import { optionalCount, type WireFormat } from './types.js';

const count = z.number().int().nonnegative().nullish();

export const MlxVlmFrameSchema = z.object({
  model: z.string().nullish(),
  text: z.string().nullish(),
  chunk: z.string().nullish(),
  usage: z
    .object({
      input_tokens: count,
      output_tokens: count,
      total_tokens: count,
      prompt_tps: z.number().nullish(),
      generation_tps: z.number().nullish(),
      peak_memory: z.number().nullish(),
    })
    .nullish(),
});

export type MlxVlmFrame = z.infer<typeof MlxVlmFrameSchema>;

// Text of a whole (non-streamed) body
export function extractMlxVlmText(frame: MlxVlmFrame): string | null {
  return frame.chunk ?? frame.text ?? null;
}

// Streamed fragments live in `chunk` only; a closing frame may repeat the full `text`
export function extractMlxVlmChunk(frame: MlxVlmFrame): string | null {
  return frame.chunk ?? null;
}

export function fromMlxVlmFrame(frame: MlxVlmFrame, fallbackModel: string): UnifiedResponse {
  return Object.freeze({
    model: frame.model ?? fallbackModel,
    text: extractMlxVlmText(frame) ?? '',
    // MLX-VLM has no completion flag; a whole body is always final
    done: true,
    promptEvalCount: optionalCount(frame.usage?.input_tokens),
    evalCount: optionalCount(frame.usage?.output_tokens),
  });
}

export const mlxVlmWireFormat: WireFormat<MlxVlmFrame> = {
  name: 'mlx_vlm',
  framing: 'sse',
  schema: MlxVlmFrameSchema,
  extractText: extractMlxVlmChunk,
  isDone: () => false,
  toUnified: fromMlxVlmFrame,
};
