import {
  isBillingDimension,
  MAX_DIMENSION_QUANTITY,
  resolveUsageValue,
  type UsageQuantities,
} from '../domain/billing-dimensions.js';
import type { BreakdownItem, EstimateResult } from '../domain/estimate-result.js';
import { compareByCodePoint } from '../utils/compare-by-code-point.js';
import { addDecimal, formatFixed, ZERO_AMOUNT, type DecimalAmount } from './decimal-amount.js';
import { PricingError } from './pricing-error.js';
import { computeDimensionCost } from './rate.js';
import type { ModelPricing, OverrideRatecard, PricingRegistry, Ratecard } from './types.js';

export const LATEST_PRICING_VERSION = 'latest';

export const ESTIMATE_MODES = ['strict', 'lenient'] as const;

export type EstimateMode = (typeof ESTIMATE_MODES)[number];

const COST_FRACTION_DIGITS = 6;

const estimateModeSet: ReadonlySet<string> = new Set(ESTIMATE_MODES);

export type EstimateInput = {
  provider: string;
  model: string;
  usage: UsageQuantities;
  /** `strict` or `lenient`; anything else is rejected at run time. */
  mode?: string;
  pricingVersion?: string;
  currency?: string;
  overrideRatecard?: OverrideRatecard;
};

export type BillingEngineOptions = {
  registry: PricingRegistry;
  engineVersion: string;
  now?: () => Date;
};

type ResolvedRatecard = {
  model: string;
  ratecard: Ratecard;
  tierWarning?: string;
};

type DimensionContext = {
  mode: EstimateMode;
  provider: string;
  model: string;
  warnings: string[];
};

export function isEstimateMode(value: string): value is EstimateMode {
  return estimateModeSet.has(value);
}

function selectPricingTier(
  model: ModelPricing,
  usage: UsageQuantities,
): { ratecard: Ratecard; warning: string } | undefined {
  const tiersByThreshold = [...model.tiers].sort(
    (left, right) => right.condition.threshold - left.condition.threshold,
  );

  for (const tier of tiersByThreshold) {
    const { dimension, threshold } = tier.condition;
    const value = resolveUsageValue(dimension, usage);

    if (value > threshold) {
      return {
        ratecard: tier.ratecard,
        warning: `Pricing tier applied: ${dimension} ${value} > ${threshold}.`,
      };
    }
  }

  return undefined;
}

function validateUsage(usage: UsageQuantities): void {
  for (const [dimension, quantity] of Object.entries(usage)) {
    if (dimension.length === 0) {
      throw new PricingError('INVALID_REQUEST', 'Usage dimensions must be non-empty strings', {
        details: { dimension },
      });
    }

    if (typeof quantity !== 'number' || !Number.isInteger(quantity)) {
      throw new PricingError('INVALID_REQUEST', 'Usage quantities must be integers', {
        details: { dimension, quantity },
      });
    }

    if (quantity < 0 || quantity > MAX_DIMENSION_QUANTITY) {
      throw new PricingError('INVALID_REQUEST', 'Usage quantity out of range', {
        details: { dimension, min: 0, max: MAX_DIMENSION_QUANTITY, quantity },
      });
    }
  }
}

function rejectOrSkipDimension(dimension: string, context: DimensionContext): void {
  if (context.mode === 'strict') {
    throw new PricingError('UNSUPPORTED_DIMENSION', 'Unsupported dimension', {
      details: { provider: context.provider, model: context.model, dimension },
    });
  }

  context.warnings.push(
    `Ignored unsupported dimension '${dimension}' for provider '${context.provider}' model '${context.model}'`,
  );
}

/**
 * Stateless cost calculator over a pricing registry. Every failure is raised
 * as a {@link PricingError}; nothing is caught here.
 */
export class BillingEngine {
  public readonly engineVersion: string;

  private readonly registry: PricingRegistry;
  private readonly now: () => Date;

  public constructor(options: BillingEngineOptions) {
    this.registry = options.registry;
    this.engineVersion = options.engineVersion;
    this.now = options.now ?? (() => new Date());
  }

  public get pricingVersion(): string {
    return this.registry.pricingVersion;
  }

  public get currency(): string {
    return this.registry.currency;
  }

  public estimate(input: EstimateInput): EstimateResult {
    const mode = input.mode ?? 'strict';

    this.validatePricingVersion(input.pricingVersion ?? LATEST_PRICING_VERSION);
    this.validateCurrency(input.currency ?? this.registry.currency);

    if (!isEstimateMode(mode)) {
      throw new PricingError('INVALID_REQUEST', 'Mode must be strict or lenient', {
        details: { mode },
      });
    }

    validateUsage(input.usage);

    const resolved = this.resolveRatecard(input);
    const warnings: string[] = resolved.tierWarning ? [resolved.tierWarning] : [];
    const context: DimensionContext = {
      mode,
      provider: input.provider,
      model: resolved.model,
      warnings,
    };
    const breakdown: BreakdownItem[] = [];
    let totalCost: DecimalAmount = ZERO_AMOUNT;

    for (const dimension of Object.keys(input.usage).sort(compareByCodePoint)) {
      const quantity = input.usage[dimension];

      if (quantity === 0) {
        continue;
      }

      const rate = isBillingDimension(dimension) ? resolved.ratecard[dimension] : undefined;

      if (!rate) {
        rejectOrSkipDimension(dimension, context);
        continue;
      }

      const cost = computeDimensionCost(quantity, rate);
      totalCost = addDecimal(totalCost, cost);
      breakdown.push({
        dimension,
        quantity,
        rate: rate.raw,
        cost: formatFixed(cost, COST_FRACTION_DIGITS),
      });
    }

    return {
      pricingVersion: this.registry.pricingVersion,
      provider: input.provider,
      model: resolved.model,
      breakdown,
      currency: this.registry.currency,
      totalCost: formatFixed(totalCost, COST_FRACTION_DIGITS),
      warnings,
      computedAt: this.now().toISOString(),
      engineVersion: this.engineVersion,
    };
  }

  private resolveRatecard(input: EstimateInput): ResolvedRatecard {
    const { overrideRatecard } = input;

    if (overrideRatecard) {
      if (overrideRatecard.currency !== this.registry.currency) {
        throw new PricingError(
          'INVALID_REQUEST',
          `Override currency must be ${this.registry.currency}`,
          { details: { currency: overrideRatecard.currency } },
        );
      }

      return { model: input.model, ratecard: overrideRatecard.ratecard };
    }

    const providerPricing = this.registry.getProvider(input.provider);

    if (!providerPricing) {
      throw new PricingError('PROVIDER_NOT_SUPPORTED', 'Provider not supported', {
        details: { provider: input.provider },
      });
    }

    const resolvedModel = this.registry.resolveModel(input.provider, input.model);
    const modelPricing = providerPricing.models.get(resolvedModel);

    if (!modelPricing) {
      throw new PricingError('MODEL_NOT_FOUND', 'Model not found', {
        details: { provider: input.provider, model: input.model },
      });
    }

    const tier = selectPricingTier(modelPricing, input.usage);

    if (!tier) {
      return { model: resolvedModel, ratecard: modelPricing.ratecard };
    }

    return { model: resolvedModel, ratecard: tier.ratecard, tierWarning: tier.warning };
  }

  private validatePricingVersion(pricingVersion: string): void {
    if (
      pricingVersion === LATEST_PRICING_VERSION ||
      pricingVersion === this.registry.pricingVersion
    ) {
      return;
    }

    throw new PricingError('PRICING_VERSION_NOT_FOUND', 'Pricing version not found', {
      details: { pricing_version: pricingVersion },
    });
  }

  private validateCurrency(currency: string): void {
    if (currency === this.registry.currency) {
      return;
    }

    throw new PricingError('INVALID_REQUEST', `Currency must be ${this.registry.currency}`, {
      details: { currency },
    });
  }
}
