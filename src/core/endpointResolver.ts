// Endpoint resolution: override > config property > environment > fallback

import { BACKENDS, type BackendType, type ConfigSource } from './types.js';

function nonBlank(value: string | undefined | null): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Build a ConfigSource from a property map and an environment.
 * Property keys follow the dotted form, e.g. `ollama.base.url`.
 */
export function createConfigSource(
  properties: Record<string, string | undefined> = {},
  env: Record<string, string | undefined> = process.env,
): ConfigSource {
  return {
    getConfig: (key) => properties[key],
    getEnv: (key) => env[key],
  };
}

/**
 * Resolve the base URL for a backend. The first non-blank candidate wins and
 * a trailing slash is dropped so paths can be appended directly.
 */
export function resolveBaseUrl(
  type: BackendType,
  override?: string | null,
  source: ConfigSource = createConfigSource(),
): string {
  const definition = BACKENDS[type];
  const candidates = [override, source.getConfig(definition.configKey), source.getEnv(definition.envKey)];
  const url = candidates.find(nonBlank) ?? definition.fallbackUrl;
  return url.trim().replace(/\/+$/, '');
}
