/**
 * Ollama Integration - Chat Types
 *
 * Types for the chat endpoint.
 */

import { z } from 'zod';
import type { ModelOptions } from './options.js';

/**
 * Message role in conversation
 */
export type Role = 'system' | 'user' | 'assistant';

/**
 * Chat message
 */
export interface Message {
  role: Role;
  content: string;
  /** Base64-encoded images for multimodal models */
  images?: string[];
}

/**
 * Chat request
 *
 * An empty `messages` list is left out of the body, which asks the server
 * to load the model without answering.
 */
export interface ChatRequest {
  /**
   * Model name; falls back to the client's default model
   */
  model?: string;

  /**
   * Conversation so far, oldest first
   */
  messages: Message[];

  /**
   * Response format; only "json" is accepted by the server
   */
  format?: string;

  /**
   * Model inference options
   */
  options?: ModelOptions;

  /**
   * Duration to keep the model loaded (e.g. "5m")
   */
  keep_alive?: string;
}

/**
 * Chat streaming chunk
 *
 * Intermediate chunks carry a fragment of the assistant message. The final
 * chunk carries `done: true` and timing metrics, usually without a message.
 */
export interface ChatChunk {
  model?: string;
  created_at?: string;
  /** Partial assistant message */
  message?: Message;
  done: boolean;
  total_duration?: number;
  load_duration?: number;
  prompt_eval_count?: number;
  prompt_eval_duration?: number;
  eval_count?: number;
  eval_duration?: number;
  [key: string]: unknown;
}

/**
 * Folded chat result
 *
 * The final chunk with `message` holding the whole assistant reply.
 */
export interface ChatResult extends ChatChunk {
  message: Message;
  done: true;
  status: 'success';
}

const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string().default(''),
  images: z.array(z.string()).optional(),
});

export const ChatChunkSchema: z.ZodType<ChatChunk, z.ZodTypeDef, unknown> = z
  .object({
    model: z.string().optional(),
    created_at: z.string().optional(),
    message: MessageSchema.optional(),
    done: z.boolean().default(false),
    total_duration: z.number().optional(),
    load_duration: z.number().optional(),
    prompt_eval_count: z.number().optional(),
    prompt_eval_duration: z.number().optional(),
    eval_count: z.number().optional(),
    eval_duration: z.number().optional(),
  })
  .passthrough();
