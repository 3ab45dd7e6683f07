import { describe, expect, it } from 'vitest';

import { compareByCodePoint, sortByCodePoint } from '../../src/utils/compare-by-code-point.js';

describe('compareByCodePoint', () => {
  it('returns 0 for identical strings', () => {
    expect(compareByCodePoint('output_tokens', 'output_tokens')).toBe(0);
  });

  it('orders by Unicode code point, including surrogate pairs', () => {
    const astral = '\u{10000}';
    const privateUse = '\uE000';

    expect(compareByCodePoint(astral, privateUse)).toBe(1);
    expect(compareByCodePoint(privateUse, astral)).toBe(-1);
  });

  it('orders a prefix before the longer string', () => {
    expect(compareByCodePoint('input', 'input_tokens_cached')).toBe(-1);
    expect(compareByCodePoint('input_tokens_cached', 'input')).toBe(1);
  });

  it('places uppercase before lowercase regardless of locale', () => {
    expect(compareByCodePoint('Zeta', 'alpha')).toBe(-1);
  });
});

describe('sortByCodePoint', () => {
  it('sorts any iterable of strings into a new array', () => {
    const dimensions = new Set(['output_tokens', 'input_tokens_uncached', 'input_tokens_cached']);

    expect(sortByCodePoint(dimensions)).toEqual([
      'input_tokens_cached',
      'input_tokens_uncached',
      'output_tokens',
    ]);
  });
});
