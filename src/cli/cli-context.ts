import { getRegistryRuntimeConfig } from '../config/runtime-overrides.js';
import { BillingEngine } from '../pricing/billing-engine.js';
import { FilePricingRegistry } from '../pricing/file-pricing-registry.js';
import { resolveOutputFormat, type OutputFormat } from '../render/output-format.js';

export type SharedCommandOptions = {
  registryDir?: string;
  json?: boolean;
  markdown?: boolean;
};

export type CliContext = {
  registry: FilePricingRegistry;
  engine: BillingEngine;
  format: OutputFormat;
};

export type CreateCliContextOptions = {
  engineVersion: string;
  env?: NodeJS.ProcessEnv;
};

export function createCliContext(
  options: SharedCommandOptions,
  contextOptions: CreateCliContextOptions,
): CliContext {
  const format = resolveOutputFormat(options);
  const runtimeConfig = getRegistryRuntimeConfig(contextOptions.env);
  const registry = new FilePricingRegistry({
    rootDir: options.registryDir ?? runtimeConfig.registryDir,
  });
  const engine = new BillingEngine({ registry, engineVersion: contextOptions.engineVersion });

  return { registry, engine, format };
}
