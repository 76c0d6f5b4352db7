import { describe, it, expect } from 'vitest';
import { ModelInfoSchema, formatBytes, formatModelSummary, hasModelDetails, toModelInfo } from '../modelInfo.js';

describe('formatBytes', () => {
  it('should use binary units', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(2048)).toBe('2.00 KiB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.00 MiB');
    expect(formatBytes(3.5 * 1024 * 1024 * 1024)).toBe('3.50 GiB');
  });
});

describe('toModelInfo', () => {
  it('should convert the /api/show body to camelCase details', () => {
    const raw = ModelInfoSchema.parse({
      modelfile: 'FROM gemma3',
      details: {
        parent_model: '',
        format: 'gguf',
        family: 'gemma3',
        families: ['gemma3'],
        parameter_size: '4.3B',
        quantization_level: 'Q4_K_M',
      },
      model_info: { 'general.architecture': 'gemma3' },
    });

    expect(toModelInfo(raw)).toEqual({
      modelfile: 'FROM gemma3',
      parameters: undefined,
      template: undefined,
      details: {
        parentModel: undefined,
        format: 'gguf',
        family: 'gemma3',
        families: ['gemma3'],
        parameterSize: '4.3B',
        quantizationLevel: 'Q4_K_M',
      },
      modelInfo: { 'general.architecture': 'gemma3' },
    });
  });
});

describe('formatModelSummary', () => {
  it('should list details, size and architecture', () => {
    const summary = formatModelSummary({
      details: { family: 'llama', parameterSize: '8.0B', quantizationLevel: 'Q4_0', format: 'gguf' },
      modelInfo: { 'general.architecture': 'llama', 'general.file_size': 4 * 1024 * 1024 * 1024 },
    });

    expect(summary).toBe(
      'Family:               llama\n' +
        'Parameters:           8.0B\n' +
        'Quantization:         Q4_0\n' +
        'Format:               gguf\n' +
        'Model Size:           4.00 GiB\n' +
        'Architecture:         llama\n',
    );
  });

  it('should be empty without details', () => {
    expect(formatModelSummary({})).toBe('');
  });
});

describe('hasModelDetails', () => {
  it('should need details or a non-empty model_info map', () => {
    expect(hasModelDetails({})).toBe(false);
    expect(hasModelDetails({ modelInfo: {} })).toBe(false);
    expect(hasModelDetails({ modelInfo: { 'general.architecture': 'llama' } })).toBe(true);
    expect(hasModelDetails({ details: { family: 'llama' } })).toBe(true);
  });
});
