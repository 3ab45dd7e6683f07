import { describe, expect, it } from 'vitest';

import { asRecord, asStringRecord, isRecord } from '../../src/utils/as-record.js';

describe('asRecord', () => {
  it('returns plain objects and rejects non-record values', () => {
    expect(asRecord({ provider: 'openai' })).toEqual({ provider: 'openai' });
    expect(asRecord(Object.create(null))).toEqual({});

    expect(asRecord(null)).toBeUndefined();
    expect(asRecord(undefined)).toBeUndefined();
    expect(asRecord('openai')).toBeUndefined();
    expect(asRecord(42)).toBeUndefined();
    expect(asRecord(['openai'])).toBeUndefined();
  });

  it('exposes the record guard', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
  });
});

describe('asStringRecord', () => {
  it('keeps only string-valued entries', () => {
    expect(asStringRecord({ 'gpt-5': 'gpt-5.2', broken: 7, nested: { a: 'b' } })).toEqual({
      'gpt-5': 'gpt-5.2',
    });
  });

  it('returns undefined for non-record input', () => {
    expect(asStringRecord(undefined)).toBeUndefined();
    expect(asStringRecord(['gpt-5'])).toBeUndefined();
  });
});
