import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { createBackend } from '../backendFactory.js';
import { LMStudioBackend } from '../backends/LMStudioBackend.js';
import { MlxVlmBackend } from '../backends/MlxVlmBackend.js';
import { OllamaBackend } from '../backends/OllamaBackend.js';
import { createConfigSource } from '../endpointResolver.js';
import { ConfigurationError, UnsupportedBackendError } from '../errors.js';
import type { BackendLogger } from '../interfaces/logger.interface.js';
import { DEFAULT_MODEL } from '../types.js';

function makeLogger(): BackendLogger {
  return { debug: vi.fn(), log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const emptySource = createConfigSource({}, {});

describe('createBackend', () => {
  it('should build the client for each backend type', () => {
    const logger = makeLogger();

    expect(createBackend({ type: 'ollama', logger, configSource: emptySource })).toBeInstanceOf(OllamaBackend);
    expect(createBackend({ type: 'lmstudio', logger, configSource: emptySource })).toBeInstanceOf(LMStudioBackend);
    expect(createBackend({ type: 'mlx_vlm', logger, configSource: emptySource })).toBeInstanceOf(MlxVlmBackend);
  });

  it('should accept loose spellings of the backend name', () => {
    const backend = createBackend({ type: 'MLX-VLM', logger: makeLogger(), configSource: emptySource });

    expect(backend.type).toBe('mlx_vlm');
    expect(backend.baseUrl).toBe('http://localhost:8000');
  });

  it('should throw UnsupportedBackendError for an unknown type', () => {
    expect(() => createBackend({ type: 'vllm', logger: makeLogger() })).toThrow(UnsupportedBackendError);
    expect(() => createBackend({ type: 'vllm', logger: makeLogger() })).toThrow('Unsupported backend: "vllm"');
  });

  it('should resolve the endpoint through the config source', () => {
    const source = createConfigSource({}, { LMSTUDIO_BASE_URL: 'http://gpu-box:1234/v1/' });

    const backend = createBackend({ type: 'lmstudio', logger: makeLogger(), configSource: source });

    expect(backend.baseUrl).toBe('http://gpu-box:1234/v1');
  });

  it('should let an explicit base URL win', () => {
    const source = createConfigSource({ 'ollama.base.url': 'http://config:11434' }, {});

    const backend = createBackend({
      type: 'ollama',
      baseUrl: 'http://explicit:11434',
      logger: makeLogger(),
      configSource: source,
    });

    expect(backend.baseUrl).toBe('http://explicit:11434');
  });

  it('should default the model and reject a bad timeout', () => {
    expect(createBackend({ type: 'ollama', logger: makeLogger(), configSource: emptySource }).model).toBe(DEFAULT_MODEL);
    expect(createBackend({ type: 'ollama', model: ' llava ', logger: makeLogger() }).model).toBe('llava');
    expect(() => createBackend({ type: 'ollama', timeoutMs: -1, logger: makeLogger() })).toThrow(ConfigurationError);
  });

  it('should log the initialized backend', () => {
    const logger = makeLogger();

    createBackend({ type: 'ollama', model: 'gemma3', logger, configSource: emptySource });

    expect(logger.info).toHaveBeenCalledWith('Initialized backend', {
      backend: 'ollama',
      baseUrl: 'http://localhost:11434',
      model: 'gemma3',
    });
  });
});

describe('createBackend - image reader', () => {
  let fetchSpy: Mock<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchSpy);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should read images through the injected reader', async () => {
    fetchSpy.mockResolvedValueOnce(new Response(JSON.stringify({ response: 'ok', done: true })));
    const readImage = vi.fn(async () => new Uint8Array([0xff]));

    const backend = createBackend({ type: 'ollama', logger: makeLogger(), configSource: emptySource, readImage });
    await backend.generate('Describe', undefined, { images: ['/pics/a.webp'] });

    expect(readImage).toHaveBeenCalledWith('/pics/a.webp');
    const body = JSON.parse(String(fetchSpy.mock.calls[0]?.[1]?.body));
    expect(body.images).toEqual(['/w==']);
  });
});
