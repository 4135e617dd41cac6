/**
 * Ollama Integration - Progress Types
 *
 * Progress chunks streamed by create, pull and push.
 */

import { z } from 'zod';

/**
 * Progress update without layer identity
 */
export interface ProgressUpdate {
  /** Human-readable step, e.g. "pulling manifest" or "success" */
  status?: string;
  /** Layer size in bytes */
  total?: number;
  /** Bytes transferred so far */
  completed?: number;
  [key: string]: unknown;
}

/**
 * Progress chunk
 *
 * Layer transfers carry the layer `digest` together with byte counts.
 */
export interface ProgressChunk extends ProgressUpdate {
  /** Content address of the layer being transferred */
  digest?: string;
}

/**
 * Folded progress result
 *
 * Normalized shape shared by create, pull and push. The server's layers are
 * not merged beside `status` as `{ [digest]: update, status }`; they are
 * nested under `layers`, so a digest can never collide with `status`.
 *
 * @example
 * ```typescript
 * {
 *   status: 'success',
 *   layers: { 'sha256:aaa': { status: 'downloading', total: 10, completed: 10 } },
 *   last: { status: 'success' },
 * }
 * ```
 */
export interface ProgressResult {
  status: 'success';
  /** Last update seen for each layer, keyed by digest */
  layers: Record<string, ProgressUpdate>;
  /** Last chunk of the stream, if any */
  last?: ProgressChunk;
}

export const ProgressChunkSchema: z.ZodType<ProgressChunk, z.ZodTypeDef, unknown> = z
  .object({
    status: z.string().optional(),
    digest: z.string().optional(),
    total: z.number().optional(),
    completed: z.number().optional(),
  })
  .passthrough();
