/**
 * Chunk decoding
 *
 * Every parsed line goes through one discriminated step: an `error` field
 * with a non-empty value wins over any other key the line carries.
 */

import type { z } from 'zod';
import { OllamaError, UpstreamError } from '../types/errors.js';
import { isRecord, isTruthy } from '../utils/values.js';

/**
 * A parsed line, tagged by kind
 */
export type DecodedChunk<T> =
  | { kind: 'error'; error: unknown }
  | { kind: 'data'; chunk: T };

/**
 * Turns one parsed line into a typed chunk, or throws
 */
export type ChunkDecoder<T> = (value: unknown) => T;

/**
 * Classify a parsed line against the schema of the stream it came from.
 *
 * @throws {OllamaError} STREAM_ERROR when the line is not an object or does not match the schema
 */
export function classifyChunk<T>(
  value: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  kind: string
): DecodedChunk<T> {
  if (!isRecord(value)) {
    throw OllamaError.streamError(`Expected a JSON object in ${kind} stream`);
  }

  if (isTruthy(value['error'])) {
    return { kind: 'error', error: value['error'] };
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw OllamaError.streamError(`Malformed ${kind} chunk: ${issues.join(', ')}`);
  }

  return { kind: 'data', chunk: result.data };
}

/**
 * Create a decoder that raises UpstreamError on error chunks
 */
export function createDecoder<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  kind: string
): ChunkDecoder<T> {
  return (value) => {
    const decoded = classifyChunk(value, schema, kind);
    if (decoded.kind === 'error') {
      throw new UpstreamError(decoded.error);
    }
    return decoded.chunk;
  };
}
