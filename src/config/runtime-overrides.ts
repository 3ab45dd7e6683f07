import { MAX_BATCH_SIZE } from '../domain/billing-dimensions.js';

const MAX_BATCH_SIZE_LIMIT = 1_000;

function resolveBoundedEnvInteger(
  envValue: string | undefined,
  defaults: {
    fallback: number;
    min: number;
    max: number;
  },
): number {
  if (envValue === undefined) {
    return defaults.fallback;
  }

  const trimmedValue = envValue.trim();

  if (trimmedValue.length === 0 || !/^[+-]?\d+$/u.test(trimmedValue)) {
    return defaults.fallback;
  }

  const parsedValue = Number.parseInt(trimmedValue, 10);

  return Math.min(defaults.max, Math.max(defaults.min, parsedValue));
}

function resolveEnvPath(envValue: string | undefined): string | undefined {
  const trimmedValue = envValue?.trim();
  return trimmedValue ? trimmedValue : undefined;
}

export type RegistryRuntimeConfig = {
  registryDir?: string;
};

export type BatchRuntimeConfig = {
  maxBatchSize: number;
};

export function getRegistryRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
): RegistryRuntimeConfig {
  return {
    registryDir: resolveEnvPath(env.LLM_COST_REGISTRY_DIR),
  };
}

export function getBatchRuntimeConfig(env: NodeJS.ProcessEnv = process.env): BatchRuntimeConfig {
  return {
    maxBatchSize: resolveBoundedEnvInteger(env.LLM_COST_MAX_BATCH_SIZE, {
      fallback: MAX_BATCH_SIZE,
      min: 1,
      max: MAX_BATCH_SIZE_LIMIT,
    }),
  };
}
