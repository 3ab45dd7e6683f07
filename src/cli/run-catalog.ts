import { describeVersions, listModelSummaries, listProviderSummaries } from '../pricing/catalog.js';
import { renderJson } from '../render/output-format.js';
import { renderModels, renderProviders, renderVersions } from '../render/render-catalog.js';
import { logger } from '../utils/logger.js';
import type { CliContext, SharedCommandOptions } from './cli-context.js';

export type ModelsCommandOptions = SharedCommandOptions & {
  includeRates?: boolean;
};

export function buildProvidersReport(context: CliContext): string {
  return renderProviders(listProviderSummaries(context.registry), { format: context.format });
}

export function buildModelsReport(
  provider: string,
  options: ModelsCommandOptions,
  context: CliContext,
): string {
  const response = listModelSummaries(context.registry, provider, {
    includeRates: options.includeRates,
  });

  return renderModels(response, { format: context.format });
}

export function buildVersionsReport(context: CliContext): string {
  return renderVersions(describeVersions(context.registry, context.engine.engineVersion), {
    format: context.format,
  });
}

export function buildValidateReport(context: CliContext): string {
  const summary = context.registry.loadAll();

  if (context.format === 'json') {
    return renderJson({
      pricing_version: context.registry.pricingVersion,
      valid: true,
      provider_count: summary.providerCount,
      model_count: summary.modelCount,
      provider_alias_count: summary.providerAliasCount,
      model_alias_count: summary.modelAliasCount,
    });
  }

  logger.success(`Registry ${context.registry.pricingVersion} loaded from ${context.registry.rootDir}`);

  return [
    `Providers: ${summary.providerCount}`,
    `Models: ${summary.modelCount}`,
    `Provider aliases: ${summary.providerAliasCount}`,
    `Model aliases: ${summary.modelAliasCount}`,
  ].join('\n');
}
