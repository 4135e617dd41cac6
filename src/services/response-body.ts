/**
 * Validation of single-document response bodies
 */

import type { z } from 'zod';
import type { HttpResponse } from '../transport/types.js';
import { OllamaError } from '../types/errors.js';

/**
 * Check a JSON response body against its schema.
 *
 * @throws {OllamaError} INTERNAL_ERROR when the body has an unexpected shape
 */
export function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  response: HttpResponse,
  operation: string
): T {
  const result = schema.safeParse(response.body);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw OllamaError.internalError(
      `Unexpected ${operation} response: ${issues.join(', ')}`,
      response.status
    );
  }
  return result.data;
}
