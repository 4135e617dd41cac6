/**
 * Configuration module for the Ollama client.
 *
 * @example
 * ```typescript
 * import { OllamaClientBuilder } from './config';
 *
 * // Build client from environment
 * const client = new OllamaClientBuilder()
 *   .baseUrlFromEnv()
 *   .defaultModelFromEnv()
 *   .build();
 *
 * // Build client with custom configuration
 * const client = new OllamaClientBuilder()
 *   .baseUrl('http://gpu-box:11434')
 *   .timeoutMs(60000)
 *   .defaultModel('llama2')
 *   .build();
 * ```
 */

export * from './types.js';
export * from './constants.js';
export * from './schema.js';
export * from './builder.js';
