import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { z } from 'zod';
import { LMStudioBackend } from '../backends/LMStudioBackend.js';
import { ImageEncoder } from '../imageEncoder.js';
import type { BackendLogger } from '../interfaces/logger.interface.js';
import { formatTimingInfo, NO_TIMING_INFO } from '../timing.js';

// --- Test fixtures ---

const ContentPartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('image_url'), image_url: z.object({ url: z.string() }) }),
]);

const BASE_URL = 'http://localhost:1234/v1';

function makeLogger(): BackendLogger {
  return { debug: vi.fn(), log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function makeBackend(imageEncoder?: ImageEncoder) {
  return new LMStudioBackend({ baseUrl: BASE_URL, model: 'qwen2.5-7b-instruct', logger: makeLogger(), imageEncoder });
}

// --- Mock fetch ---

let fetchSpy: Mock<typeof fetch>;

beforeEach(() => {
  fetchSpy = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchSpy);
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

function mockFetchResponse(data: unknown, status = 200) {
  fetchSpy.mockResolvedValueOnce(new Response(JSON.stringify(data), { status }));
}

function sentBody(index = 0): Record<string, unknown> {
  const init = fetchSpy.mock.calls[index]?.[1];
  return JSON.parse(String(init?.body));
}

const COMPLETION = {
  id: 'chatcmpl-1',
  object: 'chat.completion',
  created: 1700000000,
  model: 'qwen2.5-7b-instruct',
  choices: [{ index: 0, message: { role: 'assistant', content: 'Paris.' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 14, completion_tokens: 2, total_tokens: 16 },
};

// =============================================
// Request construction
// =============================================
describe('LMStudioBackend - request', () => {
  it('should post chat completions with a system and a user message', async () => {
    mockFetchResponse(COMPLETION);

    await makeBackend().generate('Capital of France?', 'Answer in one word.', { maxTokens: 32, temperature: 0.1 });

    expect(fetchSpy.mock.calls[0]?.[0]).toBe(`${BASE_URL}/chat/completions`);
    expect(sentBody()).toEqual({
      model: 'qwen2.5-7b-instruct',
      messages: [
        { role: 'system', content: 'Answer in one word.' },
        { role: 'user', content: 'Capital of France?' },
      ],
      stream: false,
      max_tokens: 32,
      temperature: 0.1,
    });
  });

  it('should fall back to the context size for max_tokens', async () => {
    mockFetchResponse(COMPLETION);

    await makeBackend().generate('hi', undefined, { numCtx: 4096, topP: 0.5, seed: 3 });

    const body = sentBody();
    expect(body.max_tokens).toBe(4096);
    expect(body.top_p).toBe(0.5);
    expect(body.seed).toBe(3);
  });

  it('should put the text part first and images as data URLs', async () => {
    mockFetchResponse(COMPLETION);
    const encoder = new ImageEncoder(async () => new Uint8Array([1, 2, 3]));

    await makeBackend(encoder).generate('Compare these', undefined, {
      images: ['/data/diagram.png', 'https://example.com/b.jpg'],
    });

    expect(sentBody().messages).toEqual([
      {
        role: 'user',
        content: [
          { type: 'text', text: 'Compare these' },
          { type: 'image_url', image_url: { url: 'data:image/png;base64,AQID' } },
          { type: 'image_url', image_url: { url: 'https://example.com/b.jpg' } },
        ],
      },
    ]);
  });
});

describe('LMStudioBackend - local images', () => {
  const FIRST_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x01]);
  const SECOND_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0x02, 0x03, 0x04]);
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'lmstudio-images-'));
    await writeFile(path.join(dir, 'first.png'), FIRST_BYTES);
    await writeFile(path.join(dir, 'second.jpg'), SECOND_BYTES);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should send one text part then one data URL per file, each decoding to the file bytes', async () => {
    mockFetchResponse(COMPLETION);

    await makeBackend().generate('Compare these', undefined, {
      images: [path.join(dir, 'first.png'), path.join(dir, 'second.jpg')],
    });

    const [message] = z
      .array(z.object({ role: z.string(), content: z.array(ContentPartSchema) }))
      .parse(sentBody().messages);
    const parts = message?.content ?? [];
    expect(message?.role).toBe('user');
    expect(parts).toHaveLength(3);
    expect(parts[0]).toEqual({ type: 'text', text: 'Compare these' });

    const urls = parts.slice(1).map((part) => (part.type === 'image_url' ? part.image_url.url : ''));
    expect(urls.map((url) => url.slice(0, url.indexOf(',') + 1))).toEqual([
      'data:image/png;base64,',
      'data:image/jpeg;base64,',
    ]);
    expect(Buffer.from(urls[0]?.split(',')[1] ?? '', 'base64').equals(FIRST_BYTES)).toBe(true);
    expect(Buffer.from(urls[1]?.split(',')[1] ?? '', 'base64').equals(SECOND_BYTES)).toBe(true);
  });
});

// =============================================
// Responses
// =============================================
describe('LMStudioBackend - response', () => {
  it('should map message content and usage counts', async () => {
    mockFetchResponse(COMPLETION);

    const response = await makeBackend().generate('Capital of France?');

    expect(response.text).toBe('Paris.');
    expect(response.model).toBe('qwen2.5-7b-instruct');
    expect(response.done).toBe(true);
    expect(response.promptEvalCount).toBe(14);
    expect(response.evalCount).toBe(2);
    expect(formatTimingInfo(response)).toBe(NO_TIMING_INFO);
  });

  it('should stream SSE deltas', async () => {
    fetchSpy.mockResolvedValueOnce(
      new Response(
        'data: {"choices":[{"index":0,"delta":{"role":"assistant","content":""}}]}\n\n' +
          'data: {"choices":[{"index":0,"delta":{"content":"Par"}}]}\n\n' +
          'data: {"choices":[{"index":0,"delta":{"content":"is."},"finish_reason":"stop"}]}\n\n' +
          'data: [DONE]\n\n',
      ),
    );
    const chunks: string[] = [];

    const response = await makeBackend().generateStreaming('Capital?', undefined, undefined, (chunk) =>
      chunks.push(chunk),
    );

    expect(sentBody().stream).toBe(true);
    expect(chunks).toEqual(['Par', 'is.']);
    expect(response.text).toBe('Paris.');
    expect(response.model).toBe('qwen2.5-7b-instruct');
    expect(response.done).toBe(true);
  });

  it('should not support model info', async () => {
    const backend = makeBackend();

    expect(backend.supportsModelInfo()).toBe(false);
    expect(await backend.getModelInfo()).toBeNull();
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
