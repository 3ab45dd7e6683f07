import type { ErrorBody } from '../pricing/pricing-error.js';
import type { BreakdownItem, EstimateResult } from './estimate-result.js';

export type EstimateResponse = {
  pricing_version: string;
  provider: string;
  model: string;
  breakdown: BreakdownItem[];
  total: {
    currency: string;
    cost: string;
  };
  warnings: string[];
  meta: {
    computed_at: string;
    engine_version: string;
  };
};

export type BatchErrorItem = {
  index: number;
  error: ErrorBody;
};

export type BatchEstimateResponse = {
  pricing_version: string;
  results: EstimateResponse[];
  errors: BatchErrorItem[];
};

export function toEstimateResponse(
  result: EstimateResult,
  extraWarnings: readonly string[] = [],
): EstimateResponse {
  return {
    pricing_version: result.pricingVersion,
    provider: result.provider,
    model: result.model,
    breakdown: result.breakdown.map((item) => ({ ...item })),
    total: {
      currency: result.currency,
      cost: result.totalCost,
    },
    warnings: [...result.warnings, ...extraWarnings],
    meta: {
      computed_at: result.computedAt,
      engine_version: result.engineVersion,
    },
  };
}
