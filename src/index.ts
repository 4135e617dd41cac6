/**
 * Ollama Client Library
 *
 * TypeScript client for the Ollama model server, consuming its
 * newline-delimited JSON streams either lazily or folded into one result.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { OllamaClientBuilder, OllamaClient } from 'ollama-ndjson-client';
 *
 * // Create client with defaults (localhost:11434)
 * const client = new OllamaClientBuilder().build();
 *
 * // Or from environment variables
 * const client = OllamaClient.fromEnv();
 *
 * // Generate text
 * const result = await client.generate.create({
 *   model: 'llama2',
 *   prompt: 'Once upon a time'
 * });
 *
 * // Pull a model, watching per-layer progress
 * for await (const chunk of await client.models.pullStream({ name: 'llama2' })) {
 *   console.log(chunk.status, chunk.completed, chunk.total);
 * }
 *
 * // List models
 * const models = await client.models.list();
 * ```
 */

// Main client
export { OllamaClient } from './client.js';

// Configuration
export {
  OllamaClientBuilder,
  DEFAULT_BASE_URL,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT_MS,
  HOST_ENV_VAR,
  MODEL_ENV_VAR,
  normalizeBaseUrl,
} from './config/index.js';

export type { OllamaConfig, FetchFn } from './config/index.js';

// Types - Errors
export { OllamaError, OllamaErrorCode, RequestError, UpstreamError } from './types/index.js';

// Types - Options
export type { ModelOptions } from './types/index.js';

// Types - Generate
export type { GenerateRequest, GenerateChunk, GenerateResult } from './types/index.js';

// Types - Chat
export type { Role, Message, ChatRequest, ChatChunk, ChatResult } from './types/index.js';

// Types - Progress
export type { ProgressChunk, ProgressUpdate, ProgressResult } from './types/index.js';

// Types - Embeddings
export type { EmbeddingsRequest, EmbeddingsResponse } from './types/index.js';

// Types - Models
export type {
  ModelDetails,
  ModelSummary,
  ModelInfo,
  CreateRequest,
  TransferRequest,
  CopyRequest,
} from './types/index.js';

// Types - Status
export type { OperationStatus, HealthStatus } from './types/index.js';

// Services (for advanced usage)
export { GenerateService } from './services/generate/index.js';
export { ChatService } from './services/chat/index.js';
export { EmbeddingsService } from './services/embeddings/index.js';
export { ModelsService } from './services/models/index.js';

// Streaming
export { ChunkStream, NdjsonParser, foldChat, foldGenerate, foldProgress } from './streaming/index.js';

// Observability
export { ConsoleLogger, NoopLogger, InMemoryLogger, createLogger } from './observability/index.js';
export type { Logger, LogLevel, LogEntry } from './observability/index.js';

// Transport (for advanced usage)
export type { HttpTransport, HttpResponse, HttpMethod } from './transport/index.js';
export { HttpTransportImpl } from './transport/index.js';
