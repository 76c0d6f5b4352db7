// Turns backend failures into a short message plus what to try next

import {
  ConfigurationError,
  ImageEncodingError,
  InvalidResponseError,
  ModelNotFoundError,
  TransportError,
  UnsupportedBackendError,
} from '../core/errors.js';
import { BACKENDS, type BackendType } from '../core/types.js';

export interface DiagnosticTarget {
  backendType: BackendType;
  baseUrl: string;
}

export interface Diagnostic {
  message: string;
  hints: string[];
}

const START_HINTS: Record<BackendType, string> = {
  ollama: 'Start it with: ollama serve',
  lmstudio: "Start the local server from LM Studio's Developer tab",
  mlx_vlm: 'Start it with: python -m mlx_vlm.server --port 8000',
};

export function describeError(error: unknown, target: DiagnosticTarget): Diagnostic {
  const message = error instanceof Error ? error.message : String(error);
  const label = BACKENDS[target.backendType].label;

  if (error instanceof TransportError) {
    if (error.timedOut) {
      return {
        message,
        hints: ['Increase the timeout with --timeout <seconds>', 'Try a smaller model or a shorter prompt'],
      };
    }
    return {
      message,
      hints: [`Is the ${label} server running at ${target.baseUrl}?`, START_HINTS[target.backendType]],
    };
  }

  if (error instanceof ModelNotFoundError) {
    const hint =
      target.backendType === 'ollama'
        ? `Pull it with: ollama pull ${error.modelName}`
        : `Load ${error.modelName} in ${label} or pick another with --model`;
    return { message, hints: [hint] };
  }

  if (error instanceof ImageEncodingError) {
    return { message, hints: ['Check the image path. Supported formats: jpg, jpeg, png, gif, webp'] };
  }

  if (error instanceof InvalidResponseError) {
    return { message, hints: [`Check that ${target.baseUrl} is a ${label} API endpoint`] };
  }

  if (error instanceof UnsupportedBackendError || error instanceof ConfigurationError) {
    return { message, hints: ['Run with --help to see valid options'] };
  }

  return { message, hints: [] };
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const lines = [`Error: ${diagnostic.message}`, ...diagnostic.hints.map((hint) => `  - ${hint}`)];
  return `${lines.join('\n')}\n`;
}
