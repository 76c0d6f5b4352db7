// OpenAI-compatible chat format (LM Studio): POST /chat/completions, SSE when streaming

import { z } from 'zod';
import type { UnifiedResponse } from '../types.js';
import { optionalCount, type WireFormat } from './types.js';

const count = z.number().int().nonnegative().nullish();

const ChatMessageSchema = z.object({
  role: z.string().nullish(),
  content: z.string().nullish(),
});

const ChoiceSchema = z.object({
  index: z.number().nullish(),
  message: ChatMessageSchema.nullish(),
  delta: ChatMessageSchema.nullish(),
  finish_reason: z.string().nullish(),
});

export const OpenAIChatFrameSchema = z.object({
  id: z.string().nullish(),
  object: z.string().nullish(),
  created: z.number().nullish(),
  model: z.string().nullish(),
  choices: z.array(ChoiceSchema).nullish(),
  usage: z
    .object({
      prompt_tokens: count,
      completion_tokens: count,
      total_tokens: count,
    })
    .nullish(),
});

export type OpenAIChatFrame = z.infer<typeof OpenAIChatFrameSchema>;

// Full responses carry `message`, stream chunks carry `delta`
export function extractOpenAIText(frame: OpenAIChatFrame): string | null {
  const choice = frame.choices?.[0];
  if (!choice) return null;
  return choice.message?.content ?? choice.delta?.content ?? null;
}

// A frame without choices (e.g. a trailing usage frame) is terminal
export function isOpenAIFrameDone(frame: OpenAIChatFrame): boolean {
  const choice = frame.choices?.[0];
  if (!choice) return true;
  return choice.finish_reason != null;
}

export function fromOpenAIFrame(frame: OpenAIChatFrame, fallbackModel: string): UnifiedResponse {
  // No timing data in this format, only token counts
  return Object.freeze({
    model: frame.model ?? fallbackModel,
    text: extractOpenAIText(frame) ?? '',
    done: isOpenAIFrameDone(frame),
    promptEvalCount: optionalCount(frame.usage?.prompt_tokens),
    evalCount: optionalCount(frame.usage?.completion_tokens),
  });
}

export const openAIWireFormat: WireFormat<OpenAIChatFrame> = {
  name: 'openai',
  framing: 'sse',
  schema: OpenAIChatFrameSchema,
  extractText: extractOpenAIText,
  isDone: isOpenAIFrameDone,
  toUnified: fromOpenAIFrame,
};
