import { formatEnvVarOverrides, getActiveEnvVarOverrides } from '../config/env-var-display.js';
import { parseEstimateRequest, type EstimateRequest } from '../domain/estimate-request.js';
import { estimateRequest } from '../pricing/estimate-requests.js';
import { PricingError } from '../pricing/pricing-error.js';
import { renderEstimate } from '../render/render-estimate.js';
import { logger } from '../utils/logger.js';
import type { CliContext, SharedCommandOptions } from './cli-context.js';
import { readJsonDocument } from './read-json-document.js';

export type EstimateCommandOptions = SharedCommandOptions & {
  provider?: string;
  model?: string;
  usage?: string[];
  mode?: string;
  pricingVersion?: string;
  gatewayPricingMode?: string;
  overrideRate?: string[];
  overrideCurrency?: string;
  request?: string;
};

type RateOptionValue = { per_1m: string } | { per_unit: string };

function splitAssignment(value: string, flagName: string, expected: string): [string, string] {
  const separatorIndex = value.indexOf('=');

  if (separatorIndex <= 0 || separatorIndex === value.length - 1) {
    throw new PricingError('INVALID_REQUEST', `Invalid ${flagName} value: ${value}`, {
      details: { expected },
    });
  }

  return [value.slice(0, separatorIndex).trim(), value.slice(separatorIndex + 1).trim()];
}

function rejectDuplicate(seen: Set<string>, key: string, flagName: string): void {
  if (seen.has(key)) {
    throw new PricingError('INVALID_REQUEST', `Duplicate ${flagName} dimension: ${key}`, {
      details: { dimension: key },
    });
  }

  seen.add(key);
}

export function parseUsageOptions(values: readonly string[]): Record<string, number> {
  const usage: Record<string, number> = {};
  const seen = new Set<string>();

  for (const value of values) {
    const [dimension, quantityText] = splitAssignment(value, '--usage', '<dimension>=<quantity>');

    if (!/^\d+$/u.test(quantityText)) {
      throw new PricingError('INVALID_REQUEST', 'Usage quantities must be integers', {
        details: { dimension, quantity: quantityText },
      });
    }

    rejectDuplicate(seen, dimension, '--usage');
    usage[dimension] = Number(quantityText);
  }

  return usage;
}

export function parseOverrideRateOptions(
  values: readonly string[],
): Record<string, RateOptionValue> {
  const billable: Record<string, RateOptionValue> = {};
  const seen = new Set<string>();
  const expected = '<dimension>=per_1m:<value> or <dimension>=per_unit:<value>';

  for (const value of values) {
    const [dimension, rateText] = splitAssignment(value, '--override-rate', expected);
    const match = /^(per_1m|per_unit):(.+)$/u.exec(rateText);

    if (!match) {
      throw new PricingError('INVALID_REQUEST', `Invalid --override-rate value: ${value}`, {
        details: { expected },
      });
    }

    rejectDuplicate(seen, dimension, '--override-rate');
    const [, kind, rawValue] = match;
    billable[dimension] = kind === 'per_1m' ? { per_1m: rawValue } : { per_unit: rawValue };
  }

  return billable;
}

// Flag values go through the same schema as request files.
function toRequestDocument(options: EstimateCommandOptions): Record<string, unknown> {
  const overrideRates = options.overrideRate ?? [];

  return {
    provider: options.provider,
    model: options.model,
    usage: parseUsageOptions(options.usage ?? []),
    options: {
      mode: options.mode,
      pricing_version: options.pricingVersion,
      gateway_pricing_mode: options.gatewayPricingMode,
    },
    overrides:
      overrideRates.length > 0
        ? {
            ratecard: {
              currency: options.overrideCurrency,
              billable: parseOverrideRateOptions(overrideRates),
            },
          }
        : undefined,
  };
}

export async function buildEstimateRequest(
  options: EstimateCommandOptions,
): Promise<EstimateRequest> {
  if (options.request) {
    const usesFlags =
      options.provider !== undefined ||
      options.model !== undefined ||
      (options.usage?.length ?? 0) > 0 ||
      (options.overrideRate?.length ?? 0) > 0;

    if (usesFlags) {
      throw new PricingError(
        'INVALID_REQUEST',
        'Use either --request or the --provider/--model/--usage flags, not both',
      );
    }

    return parseEstimateRequest(await readJsonDocument(options.request));
  }

  return parseEstimateRequest(toRequestDocument(options));
}

export async function buildEstimateReport(
  options: EstimateCommandOptions,
  context: CliContext,
): Promise<string> {
  const request = await buildEstimateRequest(options);
  const response = estimateRequest(context.engine, request);

  if (context.format !== 'terminal') {
    return renderEstimate(response, { format: context.format });
  }

  logger.dim(`Pricing registry ${context.registry.pricingVersion} (${context.registry.currency})`);

  const outputLines = formatEnvVarOverrides(getActiveEnvVarOverrides());

  if (outputLines.length > 0) {
    outputLines.push('');
  }

  outputLines.push(renderEstimate(response, { format: 'terminal' }));

  return outputLines.join('\n');
}
