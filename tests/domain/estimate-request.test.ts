import { describe, expect, it } from 'vitest';

import {
  GATEWAY_PRICING_MODE_WARNING,
  getGatewayPricingModeWarning,
  parseBatchEstimateRequest,
  parseEstimateRequest,
  type ValidationIssue,
} from '../../src/domain/estimate-request.js';
import { PricingError } from '../../src/pricing/pricing-error.js';

const validRequest = {
  provider: 'openai',
  model: 'gpt-4.1-mini',
  usage: { input_tokens_uncached: 1_200, output_tokens: 350 },
};

function captureValidationIssues(action: () => unknown): ValidationIssue[] {
  try {
    action();
  } catch (error) {
    if (!(error instanceof PricingError)) {
      throw error;
    }

    expect(error.code).toBe('INVALID_REQUEST');
    expect(error.message).toBe('Request validation failed');

    const issues = error.details.validation_errors;

    if (!Array.isArray(issues)) {
      throw new Error('Expected validation_errors to be an array');
    }

    return issues.map((issue: unknown) => {
      if (
        typeof issue === 'object' &&
        issue !== null &&
        'path' in issue &&
        'message' in issue &&
        typeof issue.path === 'string' &&
        typeof issue.message === 'string'
      ) {
        return { path: issue.path, message: issue.message };
      }

      throw new Error('Unexpected validation issue shape');
    });
  }

  throw new Error('Expected request validation to fail');
}

describe('parseEstimateRequest', () => {
  it('fills option and override defaults', () => {
    expect(parseEstimateRequest(validRequest)).toEqual({
      ...validRequest,
      options: {
        pricing_version: 'latest',
        mode: 'strict',
        gateway_pricing_mode: 'prefer_gateway',
      },
      overrides: {},
    });
  });

  it('keeps explicit options', () => {
    const parsed = parseEstimateRequest({
      ...validRequest,
      options: { pricing_version: '2026-02-22', mode: 'lenient', gateway_pricing_mode: 'registry_only' },
    });

    expect(parsed.options).toEqual({
      pricing_version: '2026-02-22',
      mode: 'lenient',
      gateway_pricing_mode: 'registry_only',
    });
  });

  it('normalizes override rates to their decimal text', () => {
    const parsed = parseEstimateRequest({
      ...validRequest,
      overrides: {
        ratecard: {
          billable: {
            output_tokens: { per_1m: 2.5 },
            image_count: { per_unit: ' 0.040 ' },
          },
        },
      },
    });

    expect(parsed.overrides.ratecard).toEqual({
      billable: {
        output_tokens: { per_1m: '2.5' },
        image_count: { per_unit: '0.040' },
      },
    });
  });

  it('reports missing fields and unknown keys', () => {
    expect(captureValidationIssues(() => parseEstimateRequest({ ...validRequest, provider: undefined }))).toEqual([
      { path: 'provider', message: 'Required' },
    ]);
    expect(captureValidationIssues(() => parseEstimateRequest({ ...validRequest, region: 'eu' }))).toEqual([
      { path: '', message: "Unrecognized key(s) in object: 'region'" },
    ]);
  });

  it('validates usage quantities', () => {
    expect(captureValidationIssues(() => parseEstimateRequest({ ...validRequest, usage: {} }))).toEqual([
      { path: 'usage', message: 'Usage must contain at least one dimension' },
    ]);
    expect(
      captureValidationIssues(() => parseEstimateRequest({ ...validRequest, usage: { output_tokens: 1.5 } })),
    ).toEqual([{ path: 'usage.output_tokens', message: 'Usage quantities must be integers' }]);
    expect(
      captureValidationIssues(() => parseEstimateRequest({ ...validRequest, usage: { output_tokens: -1 } })),
    ).toEqual([
      { path: 'usage.output_tokens', message: 'Number must be greater than or equal to 0' },
    ]);
  });

  it('rejects a __proto__ usage key instead of dropping it', () => {
    const payload: unknown = JSON.parse(
      '{"provider":"openai","model":"gpt-4.1-mini","usage":{"__proto__":5,"output_tokens":1}}',
    );

    expect(captureValidationIssues(() => parseEstimateRequest(payload))).toEqual([
      { path: 'usage', message: "Unsupported usage dimension '__proto__'" },
    ]);
  });

  it('rejects unknown modes', () => {
    expect(
      captureValidationIssues(() => parseEstimateRequest({ ...validRequest, options: { mode: 'fast' } })),
    ).toEqual([
      {
        path: 'options.mode',
        message: "Invalid enum value. Expected 'strict' | 'lenient', received 'fast'",
      },
    ]);
  });

  it('validates override ratecards', () => {
    const withBillable = (billable: unknown): unknown => ({
      ...validRequest,
      overrides: { ratecard: { billable } },
    });

    expect(captureValidationIssues(() => parseEstimateRequest(withBillable({})))).toEqual([
      { path: 'overrides.ratecard.billable', message: 'Override ratecard billable map must not be empty' },
    ]);
    expect(
      captureValidationIssues(() =>
        parseEstimateRequest(
          withBillable({ video_frames: { per_unit: 1 }, audio_clips: { per_unit: 1 } }),
        ),
      ),
    ).toEqual([
      {
        path: 'overrides.ratecard.billable',
        message: 'Unsupported billable dimensions in overrides: audio_clips, video_frames',
      },
    ]);
    expect(
      captureValidationIssues(() =>
        parseEstimateRequest(withBillable({ output_tokens: { per_1m: 1, per_unit: 1 } })),
      ),
    ).toEqual([
      {
        path: 'overrides.ratecard.billable.output_tokens',
        message: 'Exactly one of per_1m or per_unit must be provided',
      },
    ]);
    expect(
      captureValidationIssues(() => parseEstimateRequest(withBillable({ output_tokens: { per_1m: 'cheap' } }))),
    ).toContainEqual({
      path: 'overrides.ratecard.billable.output_tokens.per_1m',
      message: 'Expected a decimal value',
    });
    expect(
      captureValidationIssues(() => parseEstimateRequest(withBillable({ output_tokens: { per_1m: -1 } }))),
    ).toContainEqual({
      path: 'overrides.ratecard.billable.output_tokens.per_1m',
      message: 'Rate values must be >= 0',
    });
  });

  it('rejects a __proto__ override dimension', () => {
    const billable: unknown = JSON.parse('{"__proto__":{"per_1m":1},"output_tokens":{"per_1m":1}}');

    expect(
      captureValidationIssues(() =>
        parseEstimateRequest({ ...validRequest, overrides: { ratecard: { billable } } }),
      ),
    ).toEqual([
      { path: 'overrides.ratecard.billable', message: "Unsupported billable dimension '__proto__'" },
    ]);
  });

  it('writes numeric override rates in positional notation', () => {
    const parsed = parseEstimateRequest({
      ...validRequest,
      overrides: { ratecard: { billable: { output_tokens: { per_1m: 0.0000001 } } } },
    });

    expect(parsed.overrides.ratecard?.billable).toEqual({ output_tokens: { per_1m: '0.0000001' } });
  });
});

describe('parseBatchEstimateRequest', () => {
  it('parses each item with request defaults', () => {
    const batch = parseBatchEstimateRequest({ items: [validRequest, validRequest] });

    expect(batch.items).toHaveLength(2);
    expect(batch.items[1]?.options.mode).toBe('strict');
  });

  it('enforces batch size bounds', () => {
    expect(captureValidationIssues(() => parseBatchEstimateRequest({ items: [] }))).toEqual([
      { path: 'items', message: 'Array must contain at least 1 element(s)' },
    ]);
    expect(
      captureValidationIssues(() =>
        parseBatchEstimateRequest({ items: [validRequest, validRequest, validRequest] }, 2),
      ),
    ).toEqual([{ path: 'items', message: 'Array must contain at most 2 element(s)' }]);
  });

  it('reports item issues with their index', () => {
    expect(
      captureValidationIssues(() =>
        parseBatchEstimateRequest({ items: [validRequest, { ...validRequest, model: '' }] }),
      ),
    ).toEqual([{ path: 'items.1.model', message: 'String must contain at least 1 character(s)' }]);
  });
});

describe('getGatewayPricingModeWarning', () => {
  it('warns only for modes other than the default', () => {
    expect(getGatewayPricingModeWarning('prefer_gateway')).toBeUndefined();
    expect(getGatewayPricingModeWarning('prefer_provider')).toBe(GATEWAY_PRICING_MODE_WARNING);
    expect(getGatewayPricingModeWarning('registry_only')).toBe(GATEWAY_PRICING_MODE_WARNING);
  });
});
