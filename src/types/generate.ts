/**
 * Ollama Integration - Generate Types
 *
 * Types for the text generation endpoint.
 */

import { z } from 'zod';
import type { ModelOptions } from './options.js';

/**
 * Text generation request
 *
 * Fields holding an empty value (empty string, empty array, `false`, `0`)
 * are left out of the request body.
 */
export interface GenerateRequest {
  /**
   * Model name; falls back to the client's default model
   */
  model?: string;

  /**
   * Input prompt
   */
  prompt: string;

  /**
   * System prompt overriding the model's default
   */
  system?: string;

  /**
   * Prompt template overriding the model's default
   */
  template?: string;

  /**
   * Context from a previous generation
   *
   * Obtained from the `context` field of a final chunk.
   */
  context?: number[];

  /**
   * Model inference options
   */
  options?: ModelOptions;

  /**
   * Response format, e.g. "json"
   */
  format?: string;

  /**
   * Skip prompt templating
   */
  raw?: boolean;

  /**
   * Base64-encoded images for multimodal models
   */
  images?: string[];

  /**
   * Duration to keep the model loaded (e.g. "5m")
   */
  keep_alive?: string;
}

/**
 * Generation streaming chunk
 *
 * Final chunk carries `done: true` plus timing metrics and context.
 */
export interface GenerateChunk {
  /** Model name used */
  model?: string;
  /** Creation timestamp (ISO 8601) */
  created_at?: string;
  /** Partial generated text */
  response: string;
  /** True on the final chunk */
  done: boolean;
  /** Context for continuation (final chunk only) */
  context?: number[];
  /** Total duration in nanoseconds (final chunk only) */
  total_duration?: number;
  /** Model load duration in nanoseconds (final chunk only) */
  load_duration?: number;
  /** Number of prompt tokens evaluated (final chunk only) */
  prompt_eval_count?: number;
  /** Prompt evaluation duration in nanoseconds (final chunk only) */
  prompt_eval_duration?: number;
  /** Number of tokens generated (final chunk only) */
  eval_count?: number;
  /** Generation duration in nanoseconds (final chunk only) */
  eval_duration?: number;
  [key: string]: unknown;
}

/**
 * Folded generation result
 *
 * The final chunk with `response` holding the whole generated text.
 */
export interface GenerateResult extends GenerateChunk {
  done: true;
  status: 'success';
}

export const GenerateChunkSchema: z.ZodType<GenerateChunk, z.ZodTypeDef, unknown> = z
  .object({
    model: z.string().optional(),
    created_at: z.string().optional(),
    response: z.string().default(''),
    done: z.boolean().default(false),
    context: z.array(z.number()).optional(),
    total_duration: z.number().optional(),
    load_duration: z.number().optional(),
    prompt_eval_count: z.number().optional(),
    prompt_eval_duration: z.number().optional(),
    eval_count: z.number().optional(),
    eval_duration: z.number().optional(),
  })
  .passthrough();
