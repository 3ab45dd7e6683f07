import type { BillingDimension } from '../domain/billing-dimensions.js';
import type { DecimalAmount } from './decimal-amount.js';

export type RateKind = 'per_1m' | 'per_unit';

export type PerMillionRate = {
  kind: 'per_1m';
  value: DecimalAmount;
  raw: string;
};

export type PerUnitRate = {
  kind: 'per_unit';
  value: DecimalAmount;
  raw: string;
};

export type Rate = PerMillionRate | PerUnitRate;

export type Ratecard = Readonly<Partial<Record<BillingDimension, Rate>>>;

export type TierCondition = {
  dimension: string;
  threshold: number;
};

export type PricingTier = {
  condition: TierCondition;
  ratecard: Ratecard;
};

export type ModelPricing = {
  model: string;
  effectiveFrom: string;
  ratecard: Ratecard;
  tiers: readonly PricingTier[];
  capabilities: readonly string[];
  metadata: Readonly<Record<string, unknown>>;
};

export type ProviderPricing = {
  provider: string;
  models: ReadonlyMap<string, ModelPricing>;
  source: Readonly<Record<string, unknown>>;
};

export type RegistryMeta = {
  pricingVersion: string;
  currency: string;
  publishedAt: string;
  schemaVersion: number;
};

export type OverrideRatecard = {
  currency: string;
  ratecard: Ratecard;
};

export interface PricingRegistry {
  readonly pricingVersion: string;
  readonly currency: string;
  readonly meta: RegistryMeta;
  listProviders(): string[];
  getProvider(provider: string): ProviderPricing | undefined;
  resolveProvider(provider: string): string;
  resolveModel(provider: string, model: string): string;
  getModel(provider: string, model: string): ModelPricing | undefined;
  listModels(provider: string): ModelPricing[];
}
