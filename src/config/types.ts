/**
 * Configuration types for the Ollama client.
 */

import type { Logger } from '../observability/logging.js';

/**
 * Fetch implementation used by the transport.
 */
export type FetchFn = typeof globalThis.fetch;

/**
 * Ollama client configuration.
 *
 * Built once and shared read-only by every service of a client.
 */
export interface OllamaConfig {
  /** Base URL for Ollama server, without trailing slash. */
  readonly baseUrl: string;
  /** Request timeout in milliseconds. */
  readonly timeoutMs: number;
  /** Optional authentication token (for proxied setups). */
  readonly authToken?: string;
  /** Default model to use. */
  readonly defaultModel?: string;
  /** Default headers for all requests. */
  readonly defaultHeaders: Readonly<Record<string, string>>;
  /** Logger for transport and service events. */
  readonly logger: Logger;
  /** Fetch implementation. */
  readonly fetch: FetchFn;
}
