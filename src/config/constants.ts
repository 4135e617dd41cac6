/**
 * Default configuration constants for the Ollama client.
 */

/** Port the Ollama server listens on by default. */
export const DEFAULT_PORT = 11434;

/** Default base URL for Ollama server. */
export const DEFAULT_BASE_URL = `http://localhost:${DEFAULT_PORT}`;

/** Default request timeout in milliseconds (2 minutes). */
export const DEFAULT_TIMEOUT_MS = 120000;

/** Environment variable overriding the base URL. */
export const HOST_ENV_VAR = 'OLLAMA_HOST';

/** Environment variable providing the default model. */
export const MODEL_ENV_VAR = 'OLLAMA_MODEL';
