import { PricingError } from '../pricing/pricing-error.js';

export type OutputFormat = 'terminal' | 'markdown' | 'json';

export type OutputFormatOptions = {
  json?: boolean;
  markdown?: boolean;
};

export function resolveOutputFormat(options: OutputFormatOptions): OutputFormat {
  if (options.markdown && options.json) {
    throw new PricingError('INVALID_REQUEST', 'Choose either --markdown or --json, not both');
  }

  if (options.json) {
    return 'json';
  }

  return options.markdown ? 'markdown' : 'terminal';
}

export function renderJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
