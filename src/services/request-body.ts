/**
 * Request body construction
 *
 * Bodies are described as an explicit list of fields. Each field decides at
 * serialization time whether it is sent; by default only non-empty values are.
 */

import { isTruthy } from '../utils/values.js';

/**
 * One candidate field of a request body
 */
export interface BodyField {
  /** JSON key */
  readonly key: string;
  /** Value supplied by the caller */
  readonly value: unknown;
  /** Whether the field is sent. Defaults to {@link isTruthy}. */
  readonly included?: (value: unknown) => boolean;
}

/**
 * Build a JSON body from field descriptors
 *
 * @example
 * ```typescript
 * buildBody([
 *   { key: 'model', value: 'llama2' },
 *   { key: 'system', value: '' },
 * ]);
 * // => { model: 'llama2' }
 * ```
 */
export function buildBody(fields: readonly BodyField[]): Record<string, unknown> {
  const body: Record<string, unknown> = {};

  for (const field of fields) {
    const included = field.included ?? isTruthy;
    if (included(field.value)) {
      body[field.key] = field.value;
    }
  }

  return body;
}
