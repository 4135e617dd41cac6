/**
 * Embeddings Service - Re-exports
 */

export { EmbeddingsService, type EmbeddingsServiceDeps } from './service.js';
