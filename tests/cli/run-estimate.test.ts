import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createCliContext } from '../../src/cli/cli-context.js';
import {
  buildEstimateReport,
  buildEstimateRequest,
  parseOverrideRateOptions,
  parseUsageOptions,
} from '../../src/cli/run-estimate.js';
import { PricingError } from '../../src/pricing/pricing-error.js';

const tempDirs: string[] = [];

beforeEach(() => {
  vi.stubEnv('LLM_COST_REGISTRY_DIR', '');
  vi.stubEnv('LLM_COST_MAX_BATCH_SIZE', '');
});

afterEach(async () => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  await Promise.all(tempDirs.map((dir) => rm(dir, { recursive: true, force: true })));
  tempDirs.length = 0;
});

async function writeRequestFile(content: string): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'llm-cost-request-'));
  tempDirs.push(dir);
  const filePath = path.join(dir, 'request.json');
  await writeFile(filePath, content, 'utf8');
  return filePath;
}

function captureError(action: () => unknown): PricingError {
  try {
    action();
  } catch (error) {
    if (error instanceof PricingError) {
      return error;
    }

    throw error;
  }

  throw new Error('Expected a PricingError');
}

describe('parseUsageOptions', () => {
  it('parses dimension=quantity pairs', () => {
    expect(parseUsageOptions(['input_tokens_uncached=1200', ' output_tokens = 350 '])).toEqual({
      input_tokens_uncached: 1_200,
      output_tokens: 350,
    });
    expect(parseUsageOptions([])).toEqual({});
  });

  it('rejects malformed pairs', () => {
    const error = captureError(() => parseUsageOptions(['output_tokens']));

    expect(error.message).toBe('Invalid --usage value: output_tokens');
    expect(error.details).toEqual({ expected: '<dimension>=<quantity>' });
    expect(() => parseUsageOptions(['=5'])).toThrow('Invalid --usage value: =5');
    expect(() => parseUsageOptions(['output_tokens='])).toThrow('Invalid --usage value: output_tokens=');
  });

  it('rejects quantities that are not non-negative integers', () => {
    const error = captureError(() => parseUsageOptions(['output_tokens=1.5']));

    expect(error.message).toBe('Usage quantities must be integers');
    expect(error.details).toEqual({ dimension: 'output_tokens', quantity: '1.5' });
    expect(() => parseUsageOptions(['output_tokens=-1'])).toThrow('Usage quantities must be integers');
  });

  it('rejects repeated dimensions', () => {
    expect(() => parseUsageOptions(['output_tokens=1', 'output_tokens=2'])).toThrow(
      'Duplicate --usage dimension: output_tokens',
    );
  });
});

describe('parseOverrideRateOptions', () => {
  it('parses per-million and per-unit rates', () => {
    expect(
      parseOverrideRateOptions(['input_tokens_uncached=per_1m:1.25', 'image_count=per_unit:0.04']),
    ).toEqual({
      input_tokens_uncached: { per_1m: '1.25' },
      image_count: { per_unit: '0.04' },
    });
  });

  it('rejects values without a rate kind', () => {
    const error = captureError(() => parseOverrideRateOptions(['output_tokens=10']));

    expect(error.message).toBe('Invalid --override-rate value: output_tokens=10');
    expect(error.details).toEqual({
      expected: '<dimension>=per_1m:<value> or <dimension>=per_unit:<value>',
    });
  });

  it('rejects repeated dimensions', () => {
    expect(() =>
      parseOverrideRateOptions(['output_tokens=per_1m:1', 'output_tokens=per_unit:2']),
    ).toThrow('Duplicate --override-rate dimension: output_tokens');
  });
});

describe('buildEstimateRequest', () => {
  it('builds a validated request from flags', async () => {
    await expect(
      buildEstimateRequest({
        provider: 'openai',
        model: 'gpt-4.1-mini',
        usage: ['output_tokens=350'],
        overrideRate: [],
      }),
    ).resolves.toEqual({
      provider: 'openai',
      model: 'gpt-4.1-mini',
      usage: { output_tokens: 350 },
      options: { pricing_version: 'latest', mode: 'strict', gateway_pricing_mode: 'prefer_gateway' },
      overrides: {},
    });
  });

  it('turns override flags into an override ratecard', async () => {
    const request = await buildEstimateRequest({
      provider: 'custom',
      model: 'my-model',
      usage: ['output_tokens=100000'],
      overrideRate: ['output_tokens=per_1m:10'],
      overrideCurrency: 'USD',
    });

    expect(request.overrides.ratecard).toEqual({
      currency: 'USD',
      billable: { output_tokens: { per_1m: '10' } },
    });
  });

  it('validates flag values with the request schema', async () => {
    await expect(
      buildEstimateRequest({ provider: 'openai', model: 'gpt-4.1', usage: ['output_tokens=1'], mode: 'fast' }),
    ).rejects.toThrow('Request validation failed');
    await expect(buildEstimateRequest({ model: 'gpt-4.1', usage: ['output_tokens=1'] })).rejects.toThrow(
      'Request validation failed',
    );
  });

  it('reads a request document', async () => {
    const filePath = await writeRequestFile(
      JSON.stringify({ provider: 'grok', model: 'grok-4', usage: { output_tokens: 10 } }),
    );

    const request = await buildEstimateRequest({ request: filePath });

    expect(request.provider).toBe('grok');
    expect(request.usage).toEqual({ output_tokens: 10 });
  });

  it('refuses to mix a request document with flags', async () => {
    const filePath = await writeRequestFile('{}');

    await expect(buildEstimateRequest({ request: filePath, provider: 'openai' })).rejects.toThrow(
      'Use either --request or the --provider/--model/--usage flags, not both',
    );
  });
});

describe('buildEstimateReport', () => {
  it('renders markdown without logging', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const context = createCliContext({ markdown: true }, { engineVersion: '0.1.0', env: {} });

    const report = await buildEstimateReport(
      {
        provider: 'openai',
        model: 'gpt-4.1-mini',
        usage: ['input_tokens_uncached=1200', 'input_tokens_cached=800', 'output_tokens=350'],
      },
      context,
    );

    expect(report.split('\n')).toEqual([
      '### Cost Estimate: openai / gpt-4.1-mini',
      '',
      'Pricing 2026-02-22 · engine 0.1.0',
      '',
      '| Dimension             | Quantity | Rate |   Cost (USD) |',
      '| :-------------------- | -------: | ---: | -----------: |',
      '| input_tokens_cached   |      800 | 0.20 |     0.000160 |',
      '| input_tokens_uncached |    1,200 | 0.80 |     0.000960 |',
      '| output_tokens         |      350 | 3.20 |     0.001120 |',
      '| **TOTAL**             |          |      | **0.002240** |',
    ]);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('renders JSON with the gateway warning', async () => {
    const context = createCliContext({ json: true }, { engineVersion: '0.1.0', env: {} });

    const report = await buildEstimateReport(
      {
        provider: 'grok',
        model: 'grok-4',
        usage: ['input_tokens_uncached=1000000'],
        gatewayPricingMode: 'registry_only',
      },
      context,
    );
    const parsed: unknown = JSON.parse(report);

    expect(parsed).toMatchObject({
      pricing_version: '2026-02-22',
      provider: 'grok',
      model: 'grok-4',
      total: { currency: 'USD', cost: '3.000000' },
      warnings: [
        'gateway_pricing_mode is not yet implemented; all requests use registry pricing regardless of this setting',
      ],
      meta: { engine_version: '0.1.0' },
    });
  });

  it('prefixes terminal output with active env overrides and logs the registry', async () => {
    vi.stubEnv('NO_COLOR', '1');
    vi.stubEnv('LLM_COST_MAX_BATCH_SIZE', '5');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const context = createCliContext({}, { engineVersion: '0.1.0', env: {} });

    const report = await buildEstimateReport(
      { provider: 'openai', model: 'gpt-5', usage: ['input_tokens_uncached=1000000'] },
      context,
    );
    const lines = report.split('\n');

    expect(lines.slice(0, 4)).toEqual([
      'Active environment overrides:',
      '  LLM_COST_MAX_BATCH_SIZE=5  (max items per batch)',
      '',
      '┌───────────────────────────────────┐',
    ]);
    expect(lines[4]).toBe('│  Cost Estimate: openai / gpt-5.2  │');
    expect(lines.at(-2)).toBe('│ TOTAL                 │           │      │   1.750000 │');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain('Pricing registry 2026-02-22 (USD)');
  });
});
