/**
 * Request body builder tests
 */

import { describe, it, expect } from 'vitest';
import { buildBody } from '../services/request-body.js';
import { isTruthy } from '../utils/values.js';

describe('buildBody', () => {
  it('should omit every empty value', () => {
    const body = buildBody([
      { key: 'model', value: 'llama2' },
      { key: 'system', value: '' },
      { key: 'context', value: [] },
      { key: 'options', value: {} },
      { key: 'seed', value: 0 },
      { key: 'insecure', value: false },
      { key: 'template', value: undefined },
      { key: 'format', value: null },
    ]);

    expect(body).toEqual({ model: 'llama2' });
  });

  it('should keep non-empty values as given', () => {
    const body = buildBody([
      { key: 'context', value: [1, 2] },
      { key: 'options', value: { temperature: 0 } },
      { key: 'insecure', value: true },
      { key: 'num', value: -1 },
    ]);

    expect(body).toEqual({
      context: [1, 2],
      options: { temperature: 0 },
      insecure: true,
      num: -1,
    });
  });

  it('should apply a per-field predicate', () => {
    const body = buildBody([
      { key: 'stream', value: false, included: (value) => value !== undefined },
      { key: 'raw', value: false },
    ]);

    expect(body).toEqual({ stream: false });
  });
});

describe('isTruthy', () => {
  it.each([
    ['', false],
    ['x', true],
    [0, false],
    [1, true],
    [[], false],
    [[0], true],
    [{}, false],
    [{ a: undefined }, true],
    [null, false],
    [undefined, false],
    [false, false],
  ])('should classify %j as %s', (value, expected) => {
    expect(isTruthy(value)).toBe(expected);
  });
});
