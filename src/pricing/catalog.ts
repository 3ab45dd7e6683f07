import { sortByCodePoint } from '../utils/compare-by-code-point.js';
import { PricingError } from './pricing-error.js';
import { serializeRatecard, type SerializedRatecard } from './rate.js';
import type { PricingRegistry } from './types.js';

export type ProviderSummary = {
  provider: string;
  model_count: number;
  capabilities: string[];
};

export type ProvidersResponse = {
  pricing_version: string;
  providers: ProviderSummary[];
};

export type ModelSummary = {
  model: string;
  effective_from: string;
  capabilities: string[];
  metadata?: Record<string, unknown>;
  billable?: SerializedRatecard;
};

export type ModelsResponse = {
  pricing_version: string;
  provider: string;
  models: ModelSummary[];
};

export type VersionsResponse = {
  pricing_version: string;
  currency: string;
  published_at: string;
  schema_version: number;
  engine_version: string;
};

export function listProviderSummaries(registry: PricingRegistry): ProvidersResponse {
  const providers = registry.listProviders().flatMap((providerId): ProviderSummary[] => {
    const provider = registry.getProvider(providerId);

    if (!provider) {
      return [];
    }

    const models = [...provider.models.values()];
    const capabilities = new Set(models.flatMap((model) => model.capabilities));

    return [
      {
        provider: provider.provider,
        model_count: models.length,
        capabilities: sortByCodePoint(capabilities),
      },
    ];
  });

  return { pricing_version: registry.pricingVersion, providers };
}

export function listModelSummaries(
  registry: PricingRegistry,
  provider: string,
  options: { includeRates?: boolean } = {},
): ModelsResponse {
  if (!registry.getProvider(provider)) {
    throw new PricingError('PROVIDER_NOT_SUPPORTED', 'Provider not supported', {
      details: { provider },
    });
  }

  const models = registry.listModels(provider).map((model): ModelSummary => {
    const summary: ModelSummary = {
      model: model.model,
      effective_from: model.effectiveFrom,
      capabilities: [...model.capabilities],
    };

    if (Object.keys(model.metadata).length > 0) {
      summary.metadata = { ...model.metadata };
    }

    if (options.includeRates) {
      summary.billable = serializeRatecard(model.ratecard);
    }

    return summary;
  });

  return { pricing_version: registry.pricingVersion, provider, models };
}

export function describeVersions(registry: PricingRegistry, engineVersion: string): VersionsResponse {
  return {
    pricing_version: registry.pricingVersion,
    currency: registry.currency,
    published_at: registry.meta.publishedAt,
    schema_version: registry.meta.schemaVersion,
    engine_version: engineVersion,
  };
}
