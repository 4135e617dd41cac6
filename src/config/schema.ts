/**
 * Validation and normalization of client configuration.
 */

import { z } from 'zod';
import { OllamaError } from '../types/errors.js';
import { DEFAULT_PORT } from './constants.js';
import type { OllamaConfig } from './types.js';

/**
 * Zod schema for the serializable part of the configuration.
 */
const configSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine(
      (url) => url.startsWith('http://') || url.startsWith('https://'),
      'Base URL must start with http:// or https://'
    ),
  timeoutMs: z.number().positive(),
  authToken: z.string().min(1).optional(),
  defaultModel: z.string().min(1).optional(),
  defaultHeaders: z.record(z.string()),
});

/**
 * Normalize a host value as found in the environment.
 *
 * A bare host (`0.0.0.0`, `gpu-box:8080`) gets `http://`, and the Ollama
 * port when it names none. A URL with a scheme keeps the scheme's port.
 * Trailing slashes are stripped so that paths can be appended by plain
 * concatenation without losing a sub-path of the base.
 */
export function normalizeBaseUrl(url: string): string {
  let normalized = url.trim();
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(normalized)) {
    const slash = normalized.indexOf('/');
    const authority = slash === -1 ? normalized : normalized.slice(0, slash);
    const path = slash === -1 ? '' : normalized.slice(slash);
    const port = /:\d+$/.test(authority) ? '' : `:${DEFAULT_PORT}`;
    normalized = `http://${authority}${port}${path}`;
  }
  return normalized.replace(/\/+$/, '');
}

/**
 * Validates a configuration.
 *
 * @throws {OllamaError} VALIDATION_ERROR listing every failing field
 */
export function validateConfig(config: OllamaConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw OllamaError.validationError(
      `Invalid configuration: ${issues.join(', ')}`,
      result.error.issues[0]?.path.join('.')
    );
  }
}

/**
 * Check if configuration points to a remote server.
 */
export function isRemote(config: Pick<OllamaConfig, 'baseUrl'>): boolean {
  const { hostname } = new URL(config.baseUrl);
  return hostname !== 'localhost' && hostname !== '127.0.0.1' && hostname !== '[::1]';
}
