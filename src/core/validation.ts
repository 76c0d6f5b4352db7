// Zod schemas for backend configuration and generation options

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_MODEL, DEFAULT_TIMEOUT_MS, type BackendType, type GenerateOptions } from './types.js';

// ============================================
// Generation options
// ============================================

export const GenerateOptionsSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().min(1).optional(),
  numCtx: z.number().int().min(1).optional(),
  topP: z.number().min(0).max(1).optional(),
  seed: z.number().int().optional(),
  images: z.array(z.string().min(1, 'image path must not be empty')).optional(),
});

/**
 * Validate generation options before a request is built.
 * @throws ConfigurationError listing every invalid field
 */
export function validateGenerateOptions(options: GenerateOptions | undefined): GenerateOptions {
  const result = GenerateOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid generation options: ${formatIssues(result.error)}`);
  }
  return result.data;
}

// ============================================
// Backend configuration
// ============================================

// Accepts `ollama`, `LMStudio`, `mlx-vlm` and similar spellings
export const BackendTypeSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase().replace(/-/g, '_'))
  .pipe(z.enum(['ollama', 'lmstudio', 'mlx_vlm']));

export const BackendConfigSchema = z.object({
  backendType: BackendTypeSchema.default('ollama'),
  baseUrl: z.string().trim().min(1).optional(),
  model: z.string().trim().min(1).default(DEFAULT_MODEL),
  requestTimeoutMs: z.coerce.number().int().min(1).default(DEFAULT_TIMEOUT_MS),
});

export type BackendConfig = z.infer<typeof BackendConfigSchema>;

export function parseBackendType(name: string): BackendType | null {
  const result = BackendTypeSchema.safeParse(name);
  return result.success ? result.data : null;
}

/**
 * Build a BackendConfig from environment variables:
 * BACKEND_TYPE, BACKEND_BASE_URL, BACKEND_MODEL, BACKEND_TIMEOUT_MS.
 * Per-backend URLs (OLLAMA_BASE_URL, ...) are handled by the endpoint resolver.
 */
export function loadBackendConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<BackendConfig> = {},
): BackendConfig {
  const result = BackendConfigSchema.safeParse({
    backendType: overrides.backendType ?? (env.BACKEND_TYPE || undefined),
    baseUrl: overrides.baseUrl ?? (env.BACKEND_BASE_URL || undefined),
    model: overrides.model ?? (env.BACKEND_MODEL || undefined),
    requestTimeoutMs: overrides.requestTimeoutMs ?? (env.BACKEND_TIMEOUT_MS || undefined),
  });
  if (!result.success) {
    throw new ConfigurationError(`Invalid backend configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}
