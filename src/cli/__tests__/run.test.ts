import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { ConsoleLoggerFactory } from '../../core/loggers/console.logger.js';
import { runDemo, type DemoContext } from '../run.js';

// --- Test fixtures ---

const OLLAMA_URL = 'http://localhost:11434';

interface CapturedOutput {
  stdout: string[];
  stderr: string[];
}

function makeContext(env: Record<string, string | undefined> = {}): { context: DemoContext; captured: CapturedOutput } {
  const captured: CapturedOutput = { stdout: [], stderr: [] };
  const context: DemoContext = {
    env,
    output: {
      stdout: (text) => captured.stdout.push(text),
      stderr: (text) => captured.stderr.push(text),
    },
    createLoggerFactory: () => new ConsoleLoggerFactory('silent'),
  };
  return { context, captured };
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

// =============================================
// Configuration errors
// =============================================
describe('runDemo - configuration', () => {
  it('should report an invalid timeout from the environment with the help hint', async () => {
    const { context, captured } = makeContext({ BACKEND_TIMEOUT_MS: 'soon' });

    const code = await runDemo(['--url', OLLAMA_URL], context);

    expect(code).toBe(1);
    expect(captured.stderr).toHaveLength(1);
    expect(captured.stderr[0]).toMatch(/^Error: Invalid backend configuration: requestTimeoutMs: /);
    expect(captured.stderr[0]?.endsWith('\n  - Run with --help to see valid options\n')).toBe(true);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should report an unknown backend from the environment with the help hint', async () => {
    const { context, captured } = makeContext({ BACKEND_TYPE: 'gpt4all' });

    const code = await runDemo([], context);

    expect(code).toBe(1);
    expect(captured.stderr[0]).toMatch(/^Error: Invalid backend configuration: backendType: /);
    expect(captured.stderr[0]?.endsWith('\n  - Run with --help to see valid options\n')).toBe(true);
  });

  it('should report an invalid flag value with the help hint', async () => {
    const { context, captured } = makeContext();

    const code = await runDemo(['--backend', 'gpt4all'], context);

    expect(code).toBe(1);
    expect(captured.stderr).toEqual([
      'Error: Invalid backend: gpt4all. Valid backends: ollama, lmstudio, mlx_vlm\n  - Run with --help to see valid options\n',
    ]);
  });
});

// =============================================
// Raw mode
// =============================================
describe('runDemo - raw mode', () => {
  it('should print only the response text', async () => {
    mockFetchResponse({ model: 'gemma3', response: 'Paris', done: true });
    const { context, captured } = makeContext();

    const code = await runDemo(['--url', OLLAMA_URL, '--raw', '--prompt', 'Capital of France?'], context);

    expect(code).toBe(0);
    expect(captured.stdout).toEqual(['Paris']);
    expect(captured.stderr).toEqual([]);
  });

  it('should print only the model summary with --info', async () => {
    mockFetchResponse({ details: { family: 'llama', parameter_size: '8.0B' } });
    const { context, captured } = makeContext();

    const code = await runDemo(['--url', OLLAMA_URL, '--raw', '--info'], context);

    expect(code).toBe(0);
    expect(String(fetchSpy.mock.calls[0]?.[0])).toBe(`${OLLAMA_URL}/api/show`);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(captured.stdout).toEqual(['Family:               llama\nParameters:           8.0B\n']);
  });

  it('should fail with --info on a backend without model info', async () => {
    const { context, captured } = makeContext();

    const code = await runDemo(['--backend', 'lmstudio', '--url', 'http://localhost:1234/v1', '--raw', '--info'], context);

    expect(code).toBe(1);
    expect(captured.stdout).toEqual([]);
    expect(captured.stderr).toEqual(['Model information not supported by LM Studio\n']);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should fail with --info when the lookup returns nothing', async () => {
    mockFetchResponse({ error: "model 'gemma3' not found" }, 404);
    const { context, captured } = makeContext();

    const code = await runDemo(['--url', OLLAMA_URL, '-r', '--info'], context);

    expect(code).toBe(1);
    expect(captured.stderr).toEqual(['Model information not available for gemma3\n']);
  });
});

// =============================================
// Standard mode
// =============================================
describe('runDemo - standard mode', () => {
  it('should explain a connection failure with remediation hints', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:11434') }));
    const { context, captured } = makeContext();

    const code = await runDemo(['--url', OLLAMA_URL], context);

    expect(code).toBe(1);
    expect(captured.stderr).toEqual([
      `Error: Ollama @ ${OLLAMA_URL}/api/generate: fetch failed (connect ECONNREFUSED 127.0.0.1:11434)\n` +
        `  - Is the Ollama server running at ${OLLAMA_URL}?\n` +
        '  - Start it with: ollama serve\n',
    ]);
  });
});
