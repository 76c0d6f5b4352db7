// Demo runner - parse arguments, build the backend and print the answer with timings
// Output goes through DemoOutput so the whole flow can run in process

import { createBackend } from '../core/backendFactory.js';
import type { AIBackend } from '../core/interfaces/backend.interface.js';
import type { BackendLoggerFactory } from '../core/interfaces/logger.interface.js';
import { PinoLoggerFactory } from '../core/loggers/pino.logger.js';
import { formatModelSummary, hasModelDetails } from '../core/modelInfo.js';
import { formatTimingInfo } from '../core/timing.js';
import { BACKENDS } from '../core/types.js';
import { loadBackendConfig } from '../core/validation.js';
import {
  USAGE,
  formatParameterSummary,
  hasModelParameters,
  parseDemoArgs,
  toGenerateOptions,
  type DemoArgs,
  type ParsedDemoArgs,
} from './args.js';
import { describeError, formatDiagnostic } from './diagnostics.js';

const RULE = '-'.repeat(60);
const DOUBLE_RULE = '='.repeat(60);
const HELP_HINT = 'Run with --help to see valid options';

export interface DemoOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface DemoContext {
  env: Record<string, string | undefined>;
  output: DemoOutput;
  // Raw mode gets a silent factory
  createLoggerFactory(raw: boolean): BackendLoggerFactory;
}

export const processContext: DemoContext = {
  env: process.env,
  output: {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  },
  createLoggerFactory: (raw) => new PinoLoggerFactory(raw ? { level: 'silent' } : {}),
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

class DemoPrinter {
  constructor(private readonly output: DemoOutput) {}

  line(text = ''): void {
    this.output.stdout(`${text}\n`);
  }

  write(text: string): void {
    this.output.stdout(text);
  }

  async modelInfo(backend: AIBackend): Promise<void> {
    if (!backend.supportsModelInfo()) {
      this.line(`(Model information not supported by ${BACKENDS[backend.type].label})\n`);
      return;
    }

    const info = await backend.getModelInfo(backend.model);
    if (info && hasModelDetails(info)) {
      this.line('\nModel Information:');
      this.line(RULE);
      this.write(formatModelSummary(info));
      this.line(RULE);
    } else {
      this.line('(Model information not available)\n');
    }
  }
}

// Raw info prints the summary rows only; anything else is an error on stderr
async function runRawInfo(backend: AIBackend, output: DemoOutput): Promise<number> {
  const label = BACKENDS[backend.type].label;
  if (!backend.supportsModelInfo()) {
    output.stderr(`Model information not supported by ${label}\n`);
    return 1;
  }

  const info = await backend.getModelInfo(backend.model);
  if (!info || !hasModelDetails(info)) {
    output.stderr(`Model information not available for ${backend.model}\n`);
    return 1;
  }

  output.stdout(formatModelSummary(info));
  return 0;
}

async function runRaw(backend: AIBackend, args: DemoArgs, output: DemoOutput): Promise<number> {
  if (args.info) {
    return runRawInfo(backend, output);
  }

  const options = toGenerateOptions(args);
  if (args.stream) {
    await backend.generateStreaming(args.prompt, args.systemPrompt, options, (chunk) => output.stdout(chunk));
  } else {
    const response = await backend.generate(args.prompt, args.systemPrompt, options);
    output.stdout(response.text);
  }
  return 0;
}

async function runStandard(backend: AIBackend, args: DemoArgs, out: DemoPrinter): Promise<number> {
  out.line('LLM Backend Demo');
  out.line(DOUBLE_RULE);
  out.line(`Backend: ${BACKENDS[backend.type].label} @ ${backend.baseUrl}`);
  out.line(`Model: ${backend.model}`);

  await out.modelInfo(backend);
  if (args.info) return 0;

  if (hasModelParameters(args)) {
    out.line('Model Parameters:');
    out.line(RULE);
    out.write(formatParameterSummary(args));
    out.line(`${RULE}\n`);
  }

  out.line(`Prompt: ${args.prompt}`);
  out.line(`Mode: ${args.stream ? 'Streaming' : 'Standard'}`);
  out.line(DOUBLE_RULE);
  out.line();

  const options = toGenerateOptions(args);

  if (args.stream) {
    out.line('Response (streaming):');
    out.line(RULE);
    const response = await backend.generateStreaming(args.prompt, args.systemPrompt, options, (chunk) => {
      out.write(chunk);
    });
    out.line();
    out.line(RULE);
    out.line();
    out.line(formatTimingInfo(response));
    return 0;
  }

  out.line('Generating response...\n');
  const response = await backend.generate(args.prompt, args.systemPrompt, options);
  out.line('Response:');
  out.line(RULE);
  out.line(response.text);
  out.line(RULE);
  out.line();
  out.line(formatTimingInfo(response));
  return 0;
}

/**
 * Run the demo for one command line and return the process exit code.
 * Argument and configuration errors are reported with a --help hint,
 * request failures with remediation hints for the selected backend.
 */
export async function runDemo(argv: string[], context: DemoContext = processContext): Promise<number> {
  const { output } = context;

  let parsed: ParsedDemoArgs;
  try {
    parsed = parseDemoArgs(argv);
  } catch (error: unknown) {
    output.stderr(formatDiagnostic({ message: errorMessage(error), hints: [HELP_HINT] }));
    return 1;
  }

  const { args, warnings } = parsed;
  if (args.help) {
    output.stdout(USAGE);
    return 0;
  }

  const loggerFactory = context.createLoggerFactory(args.raw);
  const logger = loggerFactory.createLogger('demo');
  warnings.forEach((warning) => logger.warn(warning));

  let backend: AIBackend;
  try {
    const backendConfig = loadBackendConfig(context.env, {
      backendType: args.backend,
      model: args.model,
      baseUrl: args.url,
      requestTimeoutMs: args.timeoutMs,
    });

    backend = createBackend({
      type: backendConfig.backendType,
      baseUrl: backendConfig.baseUrl,
      model: backendConfig.model,
      timeoutMs: backendConfig.requestTimeoutMs,
      logger: loggerFactory.createLogger(`backend:${backendConfig.backendType}`),
    });
  } catch (error: unknown) {
    output.stderr(formatDiagnostic({ message: errorMessage(error), hints: [HELP_HINT] }));
    return 1;
  }

  try {
    if (args.raw) {
      return await runRaw(backend, args, output);
    }
    logger.info('Starting demo', { backend: backend.type, model: backend.model });
    return await runStandard(backend, args, new DemoPrinter(output));
  } catch (error: unknown) {
    if (args.raw) {
      output.stderr(`${errorMessage(error)}\n`);
    } else {
      logger.error('Demo failed', { err: errorMessage(error) });
      output.stderr(formatDiagnostic(describeError(error, { backendType: backend.type, baseUrl: backend.baseUrl })));
    }
    return 1;
  } finally {
    backend.close();
  }
}
