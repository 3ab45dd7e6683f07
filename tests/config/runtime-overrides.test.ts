import { describe, expect, it } from 'vitest';

import {
  getBatchRuntimeConfig,
  getRegistryRuntimeConfig,
} from '../../src/config/runtime-overrides.js';

describe('runtime overrides', () => {
  it('uses defaults when env vars are missing', () => {
    const env: NodeJS.ProcessEnv = {};

    expect(getRegistryRuntimeConfig(env)).toEqual({ registryDir: undefined });
    expect(getBatchRuntimeConfig(env)).toEqual({ maxBatchSize: 100 });
  });

  it('reads valid overrides from env', () => {
    const env: NodeJS.ProcessEnv = {
      LLM_COST_REGISTRY_DIR: '  /srv/pricing  ',
      LLM_COST_MAX_BATCH_SIZE: '250',
    };

    expect(getRegistryRuntimeConfig(env)).toEqual({ registryDir: '/srv/pricing' });
    expect(getBatchRuntimeConfig(env)).toEqual({ maxBatchSize: 250 });
  });

  it('clamps out-of-range batch sizes to safe bounds', () => {
    expect(getBatchRuntimeConfig({ LLM_COST_MAX_BATCH_SIZE: '0' })).toEqual({ maxBatchSize: 1 });
    expect(getBatchRuntimeConfig({ LLM_COST_MAX_BATCH_SIZE: '-5' })).toEqual({ maxBatchSize: 1 });
    expect(getBatchRuntimeConfig({ LLM_COST_MAX_BATCH_SIZE: '999999' })).toEqual({
      maxBatchSize: 1_000,
    });
  });

  it('falls back to defaults for blank or malformed values', () => {
    expect(getRegistryRuntimeConfig({ LLM_COST_REGISTRY_DIR: '   ' })).toEqual({
      registryDir: undefined,
    });
    expect(getBatchRuntimeConfig({ LLM_COST_MAX_BATCH_SIZE: '' })).toEqual({ maxBatchSize: 100 });
    expect(getBatchRuntimeConfig({ LLM_COST_MAX_BATCH_SIZE: '12.5' })).toEqual({
      maxBatchSize: 100,
    });
    expect(getBatchRuntimeConfig({ LLM_COST_MAX_BATCH_SIZE: 'many' })).toEqual({
      maxBatchSize: 100,
    });
  });
});
