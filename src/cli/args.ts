// Command-line parsing for the demo CLI
// Usage: llm-backend-demo [--backend <name>] [--model <name>] [--prompt <text>] [--stream] [--raw] ...

import { ConfigurationError } from '../core/errors.js';
import { BACKEND_TYPES, type BackendType, type GenerateOptions } from '../core/types.js';
import { parseBackendType } from '../core/validation.js';

export const DEFAULT_PROMPT = 'What is the capital of France?';

export interface DemoArgs {
  backend?: BackendType;
  model?: string;
  url?: string;
  timeoutMs?: number;
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  numCtx?: number;
  images: string[];
  stream: boolean;
  raw: boolean;
  info: boolean;
  help: boolean;
}

export interface ParsedDemoArgs {
  args: DemoArgs;
  // Ignored values, reported to the user but not fatal
  warnings: string[];
}

function hasFlag(argv: string[], ...names: string[]): boolean {
  return names.some((name) => argv.includes(name));
}

function valueOf(argv: string[], ...names: string[]): string | undefined {
  for (const name of names) {
    const idx = argv.indexOf(name);
    if (idx !== -1 && idx + 1 < argv.length) {
      return argv[idx + 1];
    }
  }
  return undefined;
}

// Everything after --images / -i up to the next flag
function imagesOf(argv: string[]): string[] {
  const idx = argv.findIndex((arg) => arg === '--images' || arg === '-i');
  if (idx === -1) return [];

  const images: string[] = [];
  for (const arg of argv.slice(idx + 1)) {
    if (arg.startsWith('-')) break;
    images.push(arg);
  }
  return images;
}

/**
 * Parse demo arguments. Unknown arguments are ignored.
 * @throws ConfigurationError for an unknown backend or a bad timeout
 */
export function parseDemoArgs(argv: string[]): ParsedDemoArgs {
  const warnings: string[] = [];
  const args: DemoArgs = {
    prompt: valueOf(argv, '--prompt', '-p') ?? DEFAULT_PROMPT,
    images: imagesOf(argv),
    stream: hasFlag(argv, '--stream', '-s'),
    raw: hasFlag(argv, '--raw', '-r'),
    info: hasFlag(argv, '--info'),
    help: hasFlag(argv, '--help', '-h'),
  };

  const backendName = valueOf(argv, '--backend', '-b');
  if (backendName !== undefined) {
    const backend = parseBackendType(backendName);
    if (backend === null) {
      throw new ConfigurationError(`Invalid backend: ${backendName}. Valid backends: ${BACKEND_TYPES.join(', ')}`);
    }
    args.backend = backend;
  }

  args.model = valueOf(argv, '--model', '-m');
  args.url = valueOf(argv, '--url', '-u');
  args.systemPrompt = valueOf(argv, '--system', '--sys');

  const timeout = valueOf(argv, '--timeout', '-t');
  if (timeout !== undefined) {
    const seconds = Number(timeout);
    if (!Number.isInteger(seconds) || seconds <= 0) {
      throw new ConfigurationError(`Invalid timeout: ${timeout}. Expected a positive number of seconds`);
    }
    args.timeoutMs = seconds * 1000;
  }

  const temperature = valueOf(argv, '--temperature', '--temp');
  if (temperature !== undefined) {
    const value = Number(temperature);
    if (Number.isNaN(value) || temperature.trim() === '') {
      warnings.push(`Invalid temperature value '${temperature}', using default`);
    } else if (value < 0 || value > 2) {
      warnings.push(`Temperature must be between 0.0 and 2.0, got: ${temperature}. Using default.`);
    } else {
      args.temperature = value;
    }
  }

  const context = valueOf(argv, '--context', '--ctx');
  if (context !== undefined) {
    const value = Number(context);
    if (!Number.isInteger(value)) {
      warnings.push(`Invalid context size '${context}', using default`);
    } else if (value <= 0) {
      warnings.push(`Context size must be positive, got: ${context}. Using default.`);
    } else {
      args.numCtx = value;
    }
  }

  return { args, warnings };
}

export function toGenerateOptions(args: DemoArgs): GenerateOptions | undefined {
  if (args.temperature === undefined && args.numCtx === undefined && args.images.length === 0) {
    return undefined;
  }

  const options: GenerateOptions = {};
  if (args.temperature !== undefined) options.temperature = args.temperature;
  if (args.numCtx !== undefined) options.numCtx = args.numCtx;
  if (args.images.length > 0) options.images = [...args.images];
  return options;
}

export function hasModelParameters(args: DemoArgs): boolean {
  return (
    args.systemPrompt !== undefined ||
    args.temperature !== undefined ||
    args.numCtx !== undefined ||
    args.images.length > 0
  );
}

function row(label: string, value: string): string {
  return `${`${label}:`.padEnd(21)} ${value}\n`;
}

export function formatParameterSummary(args: DemoArgs): string {
  let summary = '';
  if (args.systemPrompt !== undefined) summary += row('System Prompt', args.systemPrompt);
  if (args.temperature !== undefined) summary += row('Temperature', String(args.temperature));
  if (args.numCtx !== undefined) summary += row('Context Size', `${args.numCtx} tokens`);
  if (args.images.length > 0) {
    summary += row('Images', `${args.images.length} image(s)`);
    args.images.forEach((image, index) => {
      summary += `  [${index + 1}] ${image}\n`;
    });
  }
  return summary;
}

export const USAGE = `LLM backend demo - one client for Ollama, LM Studio and MLX-VLM

Usage: llm-backend-demo [OPTIONS]

Options:
  -b, --backend <name>     Backend type: ollama, lmstudio, mlx_vlm (default: ollama)
  -m, --model <name>       Model name (default: gemma3)
  -u, --url <url>          Backend base URL (default depends on the backend)
  -t, --timeout <seconds>  Request timeout in seconds (default: 300)
  -p, --prompt <text>      Prompt to send (default: "${DEFAULT_PROMPT}")
      --system <text>      System prompt
      --temperature <n>    Sampling temperature, 0.0 - 2.0
      --context <n>        Context window size in tokens
  -i, --images <paths>     Image files or URLs to attach
  -s, --stream             Print the response as it is generated
  -r, --raw                Print only the response text, no logging
      --info               Show model information and exit
  -h, --help               Show this help

Environment:
  BACKEND_TYPE, BACKEND_MODEL, BACKEND_BASE_URL, BACKEND_TIMEOUT_MS
  OLLAMA_BASE_URL, LMSTUDIO_BASE_URL, MLX_VLM_BASE_URL
  LOG_LEVEL                debug, info, warn, error (default: info)
`;
