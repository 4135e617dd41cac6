/**
 * Ollama Integration - Types Module
 *
 * Central export point for all type definitions.
 */

// Error types
export { OllamaError, OllamaErrorCode, RequestError, UpstreamError } from './errors.js';

// Options types
export type { ModelOptions } from './options.js';

// Generate types
export type { GenerateRequest, GenerateChunk, GenerateResult } from './generate.js';
export { GenerateChunkSchema } from './generate.js';

// Chat types
export type { Role, Message, ChatRequest, ChatChunk, ChatResult } from './chat.js';
export { ChatChunkSchema } from './chat.js';

// Progress types
export type { ProgressChunk, ProgressUpdate, ProgressResult } from './progress.js';
export { ProgressChunkSchema } from './progress.js';

// Embeddings types
export type { EmbeddingsRequest, EmbeddingsResponse } from './embeddings.js';

// Model management types
export type {
  ModelDetails,
  ModelSummary,
  ModelInfo,
  CreateRequest,
  TransferRequest,
  CopyRequest,
} from './models.js';

// Status types
export type { OperationStatus, HealthStatus } from './health.js';
