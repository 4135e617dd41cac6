/**
 * Value predicates shared by request building and chunk decoding.
 */

/**
 * Check that a value is a plain JSON object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Truthiness of a JSON value.
 *
 * Unlike JavaScript truthiness, empty arrays and empty objects count as empty.
 */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isRecord(value)) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}
