// Contract every wire format implements so the stream decoder can stay generic

import type { z } from 'zod';
import type { StreamFraming, UnifiedResponse } from '../types.js';

export type WireFormatName = 'ollama' | 'openai' | 'mlx_vlm';

export interface WireFormat<TFrame> {
  readonly name: WireFormatName;
  readonly framing: StreamFraming;
  readonly schema: z.ZodType<TFrame>;
  // Text fragment carried by one frame, null when it carries none
  extractText(frame: TFrame): string | null;
  // Explicit completion signal; formats without one always report false
  isDone(frame: TFrame): boolean;
  toUnified(frame: TFrame, fallbackModel: string): UnifiedResponse;
}

// Counters and nanosecond durations are non-negative integers when present
export function optionalCount(value: number | null | undefined): number | undefined {
  return value ?? undefined;
}
