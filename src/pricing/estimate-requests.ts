import { isBillingDimension, type BillingDimension } from '../domain/billing-dimensions.js';
import {
  getGatewayPricingModeWarning,
  type BatchEstimateRequest,
  type EstimateRequest,
  type OverrideRatecardRequest,
} from '../domain/estimate-request.js';
import {
  toEstimateResponse,
  type BatchErrorItem,
  type BatchEstimateResponse,
  type EstimateResponse,
} from '../domain/estimate-response.js';
import type { BillingEngine, EstimateInput } from './billing-engine.js';
import { PricingError } from './pricing-error.js';
import { createRate } from './rate.js';
import type { OverrideRatecard, Rate } from './types.js';

function toOverrideRatecard(
  request: OverrideRatecardRequest,
  defaultCurrency: string,
): OverrideRatecard {
  const ratecard: Partial<Record<BillingDimension, Rate>> = {};

  for (const [dimension, rateRequest] of Object.entries(request.billable)) {
    const rate =
      rateRequest.per_1m !== undefined
        ? createRate('per_1m', rateRequest.per_1m)
        : createRate('per_unit', rateRequest.per_unit ?? '');

    if (!rate || !isBillingDimension(dimension)) {
      throw new PricingError('INVALID_REQUEST', `Invalid override rate for '${dimension}'`, {
        details: { dimension },
      });
    }

    ratecard[dimension] = rate;
  }

  return { currency: request.currency ?? defaultCurrency, ratecard };
}

export function toEstimateInput(request: EstimateRequest, defaultCurrency: string): EstimateInput {
  const overrideRequest = request.overrides.ratecard;

  return {
    provider: request.provider,
    model: request.model,
    usage: request.usage,
    mode: request.options.mode,
    pricingVersion: request.options.pricing_version,
    overrideRatecard: overrideRequest
      ? toOverrideRatecard(overrideRequest, defaultCurrency)
      : undefined,
  };
}

export function estimateRequest(engine: BillingEngine, request: EstimateRequest): EstimateResponse {
  const result = engine.estimate(toEstimateInput(request, engine.currency));
  const gatewayWarning = getGatewayPricingModeWarning(request.options.gateway_pricing_mode);

  return toEstimateResponse(result, gatewayWarning ? [gatewayWarning] : []);
}

/**
 * Estimates every item on its own. Pricing errors are reported per index and
 * never stop the remaining items.
 */
export function estimateBatch(
  engine: BillingEngine,
  batch: BatchEstimateRequest,
): BatchEstimateResponse {
  const results: EstimateResponse[] = [];
  const errors: BatchErrorItem[] = [];

  batch.items.forEach((item, index) => {
    try {
      results.push(estimateRequest(engine, item));
    } catch (error) {
      if (!(error instanceof PricingError)) {
        throw error;
      }

      errors.push({ index, error: error.toBody() });
    }
  });

  return {
    pricing_version: engine.pricingVersion,
    results,
    errors,
  };
}
