// Stream decoder - turns a streamed response body into text chunks and one final UnifiedResponse
// Handles NDJSON (one JSON object per line) and SSE (`data: ` lines, `[DONE]` sentinel)

import type { BackendLogger } from './interfaces/logger.interface.js';
import { FrameParseError, TransportError, isBackendError } from './errors.js';
import type { BackendType, ChunkHandler, UnifiedResponse } from './types.js';
import type { WireFormat } from './wire/types.js';

export const SSE_DATA_PREFIX = 'data: ';
export const SSE_DONE_SENTINEL = '[DONE]';

export interface DecodeOptions {
  // Model reported when no frame names one
  model: string;
  onChunk?: ChunkHandler;
  logger?: BackendLogger;
  backendType?: BackendType;
  endpoint?: string;
}

type LineOutcome = 'continue' | 'stop';

/**
 * Per-request decoding state. Holds the partial line left over between reads,
 * the accumulated text and the last frame that parsed. One instance per
 * request; never reused.
 */
export class StreamAccumulator<TFrame> {
  private partialLine = '';
  private textParts: string[] = [];
  private lastFrame: TFrame | undefined;
  private frameCount = 0;

  // Returns the complete lines in `decoded`, keeping the unterminated tail
  pushText(decoded: string): string[] {
    this.partialLine += decoded;
    const lines = this.partialLine.split('\n');
    this.partialLine = lines.pop() ?? '';
    return lines.map(stripCarriageReturn);
  }

  // Final unterminated line, if any
  flush(): string | null {
    const rest = this.partialLine;
    this.partialLine = '';
    return rest.length > 0 ? stripCarriageReturn(rest) : null;
  }

  append(fragment: string): void {
    this.textParts.push(fragment);
  }

  recordFrame(frame: TFrame): void {
    this.lastFrame = frame;
    this.frameCount++;
  }

  get text(): string {
    return this.textParts.join('');
  }

  get frames(): number {
    return this.frameCount;
  }

  get last(): TFrame | undefined {
    return this.lastFrame;
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Decode a streamed body in the given wire format.
 *
 * Text fragments go to `onChunk` as they arrive and are accumulated in the
 * same order. Frames that fail to parse are logged and skipped. The returned
 * response takes its metadata from the last frame that parsed, its text from
 * the accumulator, and is always `done`: the stream ending is terminal.
 *
 * Errors thrown by `onChunk` propagate unchanged, after the body is cancelled.
 *
 * @throws TransportError when reading the body fails
 */
export async function decodeStream<TFrame>(
  body: AsyncIterable<Uint8Array>,
  format: WireFormat<TFrame>,
  options: DecodeOptions,
): Promise<UnifiedResponse> {
  const { logger, backendType, endpoint } = options;
  const accumulator = new StreamAccumulator<TFrame>();
  const decoder = new TextDecoder('utf-8');
  const iterator = body[Symbol.asyncIterator]();

  const handlePayload = (payload: string): LineOutcome => {
    const frame = parseFrame(payload, format, { backendType, endpoint }, logger);
    if (frame === undefined) return 'continue';

    accumulator.recordFrame(frame);
    const fragment = format.extractText(frame);
    if (fragment) {
      options.onChunk?.(fragment);
      accumulator.append(fragment);
    }

    // NDJSON has no sentinel, so `done` is the end of the stream.
    // SSE backends may still send a usage frame before [DONE].
    return format.framing === 'ndjson' && format.isDone(frame) ? 'stop' : 'continue';
  };

  const handleLine = (line: string): LineOutcome => {
    if (format.framing === 'ndjson') {
      return line.trim().length > 0 ? handlePayload(line) : 'continue';
    }

    if (!line.startsWith(SSE_DATA_PREFIX)) return 'continue';
    const payload = line.slice(SSE_DATA_PREFIX.length).trim();
    if (payload.length === 0) return 'continue';
    if (payload === SSE_DONE_SENTINEL) return 'stop';
    return handlePayload(payload);
  };

  let stopped = false;
  let reachedEnd = false;

  try {
    while (!stopped) {
      const bytes = await readNext(iterator, { backendType, endpoint });
      if (bytes === undefined) {
        reachedEnd = true;
        break;
      }

      for (const line of accumulator.pushText(decoder.decode(bytes, { stream: true }))) {
        if (handleLine(line) === 'stop') {
          stopped = true;
          break;
        }
      }
    }
  } finally {
    // Stopped early or the handler threw: the rest of the body is not needed
    if (!reachedEnd) await releaseBody(iterator, logger);
  }

  if (reachedEnd) {
    accumulator.pushText(decoder.decode());
    const rest = accumulator.flush();
    if (rest !== null) handleLine(rest);
  }

  logger?.debug('Stream decoded', { format: format.name, frames: accumulator.frames, stoppedEarly: stopped });

  const last = accumulator.last;
  const base = last !== undefined ? format.toUnified(last, options.model) : { model: options.model };

  return Object.freeze({ ...base, text: accumulator.text, done: true });
}

async function readNext(
  iterator: AsyncIterator<Uint8Array>,
  context: { backendType?: BackendType; endpoint?: string },
): Promise<Uint8Array | undefined> {
  try {
    const result = await iterator.next();
    return result.done ? undefined : result.value;
  } catch (error: unknown) {
    if (isBackendError(error)) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new TransportError(`Stream read failed: ${message}`, { ...context, cause: error });
  }
}

async function releaseBody(iterator: AsyncIterator<Uint8Array>, logger?: BackendLogger): Promise<void> {
  try {
    await iterator.return?.();
  } catch (error: unknown) {
    // A body that already failed rejects its cancel with the read error
    logger?.debug('Stream cancel failed', { err: error instanceof Error ? error.message : String(error) });
  }
}

function parseFrame<TFrame>(
  payload: string,
  format: WireFormat<TFrame>,
  context: { backendType?: BackendType; endpoint?: string },
  logger?: BackendLogger,
): TFrame | undefined {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    logSkippedFrame(new FrameParseError(`Malformed ${format.name} frame: ${reason}`, payload, context), logger);
    return undefined;
  }

  const result = format.schema.safeParse(json);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
    logSkippedFrame(new FrameParseError(`Unexpected ${format.name} frame: ${reason}`, payload, context), logger);
    return undefined;
  }

  return result.data;
}

function logSkippedFrame(error: FrameParseError, logger?: BackendLogger): void {
  logger?.debug('Skipping stream frame', {
    err: error.message,
    payload: error.payload.substring(0, 200),
    backend: error.backendType,
  });
}
