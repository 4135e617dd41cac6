/**
 * Ollama Integration - Embeddings Types
 */

import { z } from 'zod';
import type { ModelOptions } from './options.js';

/**
 * Embeddings request
 */
export interface EmbeddingsRequest {
  /** Model name; falls back to the client's default model */
  model?: string;
  /** Text to embed */
  prompt: string;
  /** Model inference options */
  options?: ModelOptions;
}

/**
 * Embeddings response
 */
export interface EmbeddingsResponse {
  /** Embedding vector */
  embedding: number[];
}

export const EmbeddingsResponseSchema = z.object({
  embedding: z.array(z.number()),
});
