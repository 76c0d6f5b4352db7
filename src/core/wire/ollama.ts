// Ollama native format: POST /api/generate, NDJSON when streaming

import { z } from 'zod';
import type { UnifiedResponse } from '../types.js';
import { optionalCount, type WireFormat } from './types.js';

const nanos = z.number().int().nonnegative().nullish();
const count = z.number().int().nonnegative().nullish();

export const OllamaFrameSchema = z.object({
  model: z.string().nullish(),
  created_at: z.string().nullish(),
  response: z.string().nullish(),
  done: z.boolean().nullish(),
  done_reason: z.string().nullish(),
  context: z.array(z.number()).nullish(),
  total_duration: nanos,
  load_duration: nanos,
  prompt_eval_count: count,
  prompt_eval_duration: nanos,
  eval_count: count,
  eval_duration: nanos,
});

export type OllamaFrame = z.infer<typeof OllamaFrameSchema>;

export function fromOllamaFrame(frame: OllamaFrame, fallbackModel: string): UnifiedResponse {
  return Object.freeze({
    model: frame.model ?? fallbackModel,
    text: frame.response ?? '',
    done: frame.done ?? false,
    totalDurationNanos: optionalCount(frame.total_duration),
    promptEvalDurationNanos: optionalCount(frame.prompt_eval_duration),
    promptEvalCount: optionalCount(frame.prompt_eval_count),
    evalDurationNanos: optionalCount(frame.eval_duration),
    evalCount: optionalCount(frame.eval_count),
  });
}

export const ollamaWireFormat: WireFormat<OllamaFrame> = {
  name: 'ollama',
  framing: 'ndjson',
  schema: OllamaFrameSchema,
  extractText: (frame) => frame.response ?? null,
  isDone: (frame) => frame.done === true,
  toUnified: fromOllamaFrame,
};
