// Model details from Ollama's /api/show and their human-readable summary

import { z } from 'zod';
import type { ModelInfo } from './types.js';

const BYTES_PER_KIB = 1024;
const BYTES_PER_MIB = 1024 * 1024;
const BYTES_PER_GIB = 1024 * 1024 * 1024;

const SIZE_KEYS = ['general.file_size', 'file_size', 'size'];

export const ModelInfoSchema = z.object({
  modelfile: z.string().nullish(),
  parameters: z.string().nullish(),
  template: z.string().nullish(),
  details: z
    .object({
      parent_model: z.string().nullish(),
      format: z.string().nullish(),
      family: z.string().nullish(),
      families: z.array(z.string()).nullish(),
      parameter_size: z.string().nullish(),
      quantization_level: z.string().nullish(),
    })
    .nullish(),
  model_info: z.record(z.string(), z.unknown()).nullish(),
});

export function toModelInfo(raw: z.infer<typeof ModelInfoSchema>): ModelInfo {
  const details = raw.details;
  return {
    modelfile: raw.modelfile ?? undefined,
    parameters: raw.parameters ?? undefined,
    template: raw.template ?? undefined,
    details: details
      ? {
          parentModel: details.parent_model || undefined,
          format: details.format ?? undefined,
          family: details.family ?? undefined,
          families: details.families ?? undefined,
          parameterSize: details.parameter_size ?? undefined,
          quantizationLevel: details.quantization_level ?? undefined,
        }
      : undefined,
    modelInfo: raw.model_info ?? undefined,
  };
}

// Binary units (1 KiB = 1024 bytes)
export function formatBytes(bytes: number): string {
  if (bytes < BYTES_PER_KIB) return `${bytes} B`;
  if (bytes < BYTES_PER_MIB) return `${(bytes / BYTES_PER_KIB).toFixed(2)} KiB`;
  if (bytes < BYTES_PER_GIB) return `${(bytes / BYTES_PER_MIB).toFixed(2)} MiB`;
  return `${(bytes / BYTES_PER_GIB).toFixed(2)} GiB`;
}

function row(label: string, value: string): string {
  return `${`${label}:`.padEnd(21)} ${value}\n`;
}

export function hasModelDetails(info: ModelInfo): boolean {
  return info.details !== undefined || (info.modelInfo !== undefined && Object.keys(info.modelInfo).length > 0);
}

export function formatModelSummary(info: ModelInfo): string {
  let summary = '';
  const { details, modelInfo } = info;

  if (details) {
    if (details.family) summary += row('Family', details.family);
    if (details.parameterSize) summary += row('Parameters', details.parameterSize);
    if (details.quantizationLevel) summary += row('Quantization', details.quantizationLevel);
    if (details.format) summary += row('Format', details.format);
  }

  if (modelInfo) {
    const size = SIZE_KEYS.map((key) => modelInfo[key]).find((value): value is number => typeof value === 'number');
    if (size !== undefined) summary += row('Model Size', formatBytes(size));

    const architecture = modelInfo['general.architecture'];
    if (architecture !== undefined && architecture !== null) {
      summary += row('Architecture', String(architecture));
    }
  }

  return summary;
}
