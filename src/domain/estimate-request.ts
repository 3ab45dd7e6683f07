import { z } from 'zod';

import { ESTIMATE_MODES } from '../pricing/billing-engine.js';
import { formatDecimal, isNegativeDecimal, parseDecimal } from '../pricing/decimal-amount.js';
import { PricingError } from '../pricing/pricing-error.js';
import { isRecord } from '../utils/as-record.js';
import {
  isBillingDimension,
  MAX_BATCH_SIZE,
  MAX_DIMENSION_QUANTITY,
} from './billing-dimensions.js';

export const GATEWAY_PRICING_MODES = ['prefer_gateway', 'prefer_provider', 'registry_only'] as const;

export type GatewayPricingMode = (typeof GATEWAY_PRICING_MODES)[number];

export const GATEWAY_PRICING_MODE_WARNING =
  'gateway_pricing_mode is not yet implemented; all requests use registry pricing regardless of this setting';

const rateValueSchema = z
  .union([z.number().finite(), z.string().min(1)])
  .transform((value, context) => {
    const raw = String(value).trim();
    const amount = parseDecimal(raw);

    if (!amount) {
      context.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a decimal value' });
      return z.NEVER;
    }

    if (isNegativeDecimal(amount)) {
      context.addIssue({ code: z.ZodIssueCode.custom, message: 'Rate values must be >= 0' });
      return z.NEVER;
    }

    return typeof value === 'number' ? formatDecimal(amount) : raw;
  });

// Object parsers assign keys onto a plain object, where `__proto__` vanishes.
function rejectPrototypeKey(label: string) {
  return (value: unknown, context: z.RefinementCtx): unknown => {
    if (isRecord(value) && Object.hasOwn(value, '__proto__')) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unsupported ${label} '__proto__'`,
      });
    }

    return value;
  };
}

const overrideRateSchema = z
  .object({
    per_1m: rateValueSchema.optional(),
    per_unit: rateValueSchema.optional(),
  })
  .strict()
  .refine((rate) => (rate.per_1m === undefined) !== (rate.per_unit === undefined), {
    message: 'Exactly one of per_1m or per_unit must be provided',
  });

const overrideRatecardSchema = z
  .object({
    currency: z.string().min(1).optional(),
    billable: z.preprocess(
      rejectPrototypeKey('billable dimension'),
      z.record(z.string(), overrideRateSchema),
    ),
  })
  .strict()
  .superRefine((ratecard, context) => {
    const dimensions = Object.keys(ratecard.billable);

    if (dimensions.length === 0) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['billable'],
        message: 'Override ratecard billable map must not be empty',
      });
      return;
    }

    const unsupported = dimensions.filter((dimension) => !isBillingDimension(dimension)).sort();

    if (unsupported.length > 0) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['billable'],
        message: `Unsupported billable dimensions in overrides: ${unsupported.join(', ')}`,
      });
    }
  });

const estimateOptionsSchema = z
  .object({
    pricing_version: z.string().min(1).default('latest'),
    mode: z.enum(ESTIMATE_MODES).default('strict'),
    gateway_pricing_mode: z.enum(GATEWAY_PRICING_MODES).default('prefer_gateway'),
  })
  .strict();

const usageSchema = z.preprocess(
  rejectPrototypeKey('usage dimension'),
  z
    .record(
      z.string().min(1, 'Usage dimensions must be non-empty strings'),
      z
        .number()
        .int('Usage quantities must be integers')
        .min(0)
        .max(MAX_DIMENSION_QUANTITY),
    )
    .refine((usage) => Object.keys(usage).length > 0, {
      message: 'Usage must contain at least one dimension',
    }),
);

export const estimateRequestSchema = z
  .object({
    provider: z.string().min(1),
    model: z.string().min(1),
    usage: usageSchema,
    options: estimateOptionsSchema.default({}),
    overrides: z
      .object({ ratecard: overrideRatecardSchema.optional() })
      .strict()
      .default({}),
  })
  .strict();

export type EstimateRequest = z.infer<typeof estimateRequestSchema>;
export type OverrideRatecardRequest = z.infer<typeof overrideRatecardSchema>;

export type BatchEstimateRequest = {
  items: EstimateRequest[];
};

export type ValidationIssue = {
  path: string;
  message: string;
};

function toValidationError(error: z.ZodError): PricingError {
  const validationErrors: ValidationIssue[] = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));

  return new PricingError('INVALID_REQUEST', 'Request validation failed', {
    details: { validation_errors: validationErrors },
  });
}

export function parseEstimateRequest(payload: unknown): EstimateRequest {
  const result = estimateRequestSchema.safeParse(payload);

  if (!result.success) {
    throw toValidationError(result.error);
  }

  return result.data;
}

export function parseBatchEstimateRequest(
  payload: unknown,
  maxBatchSize: number = MAX_BATCH_SIZE,
): BatchEstimateRequest {
  const batchSchema = z
    .object({
      items: z.array(estimateRequestSchema).min(1).max(maxBatchSize),
    })
    .strict();
  const result = batchSchema.safeParse(payload);

  if (!result.success) {
    throw toValidationError(result.error);
  }

  return result.data;
}

export function getGatewayPricingModeWarning(mode: GatewayPricingMode): string | undefined {
  return mode === 'prefer_gateway' ? undefined : GATEWAY_PRICING_MODE_WARNING;
}
