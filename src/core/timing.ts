// Timing report in the style of `ollama run --verbose`

import type { UnifiedResponse } from './types.js';

const NANOS_PER_SECOND = 1_000_000_000;
const NANOS_PER_MILLISECOND = 1_000_000;
const NANOS_PER_MICROSECOND = 1_000;

export const NO_TIMING_INFO = 'No timing information available';

function line(label: string, value: string): string {
  return `${`${label}:`.padEnd(21)} ${value}\n`;
}

export function formatDuration(nanos: number): string {
  if (nanos >= NANOS_PER_SECOND) return `${(nanos / NANOS_PER_SECOND).toFixed(4)}s`;
  if (nanos >= NANOS_PER_MILLISECOND) return `${(nanos / NANOS_PER_MILLISECOND).toFixed(2)}ms`;
  if (nanos >= NANOS_PER_MICROSECOND) return `${(nanos / NANOS_PER_MICROSECOND).toFixed(2)}µs`;
  return `${nanos}ns`;
}

// Tokens per second, undefined unless both values are present and positive
export function tokensPerSecond(count: number | undefined, durationNanos: number | undefined): number | undefined {
  if (!count || !durationNanos) return undefined;
  return (count * NANOS_PER_SECOND) / durationNanos;
}

export function evalRate(response: UnifiedResponse): number | undefined {
  return tokensPerSecond(response.evalCount, response.evalDurationNanos);
}

export function promptEvalRate(response: UnifiedResponse): number | undefined {
  return tokensPerSecond(response.promptEvalCount, response.promptEvalDurationNanos);
}

/**
 * Render the timing block for a response. Backends that report no total
 * duration get NO_TIMING_INFO, never a zero reading.
 */
export function formatTimingInfo(response: UnifiedResponse): string {
  if (response.totalDurationNanos === undefined) {
    return NO_TIMING_INFO;
  }

  let info = line('total duration', formatDuration(response.totalDurationNanos));

  if (response.promptEvalCount) {
    info += line('prompt eval count', `${response.promptEvalCount} token(s)`);
    const rate = promptEvalRate(response);
    if (response.promptEvalDurationNanos && rate !== undefined) {
      info += line('prompt eval duration', formatDuration(response.promptEvalDurationNanos));
      info += line('prompt eval rate', `${rate.toFixed(2)} tokens/s`);
    }
  }

  if (response.evalCount) {
    info += line('eval count', `${response.evalCount} token(s)`);
    const rate = evalRate(response);
    if (response.evalDurationNanos && rate !== undefined) {
      info += line('eval duration', formatDuration(response.evalDurationNanos));
      info += line('eval rate', `${rate.toFixed(2)} tokens/s`);
    }
  }

  return info;
}
