import { normalizeError, RegistryLoadError, toErrorPayload } from '../pricing/pricing-error.js';
import { renderJson } from '../render/output-format.js';

export type CliErrorOutput = {
  stream: 'stdout' | 'stderr';
  text: string;
};

/**
 * Registry load failures keep their message since they name the offending
 * file; anything that is not a pricing error is reported as INTERNAL_ERROR.
 */
export function formatCliError(error: unknown, options: { json?: boolean } = {}): CliErrorOutput {
  if (error instanceof RegistryLoadError) {
    return { stream: 'stderr', text: `Registry load failed: ${error.message}` };
  }

  const pricingError = normalizeError(error);

  if (options.json) {
    return { stream: 'stdout', text: renderJson(toErrorPayload(pricingError)) };
  }

  const detailsText =
    Object.keys(pricingError.details).length > 0 ? ` ${JSON.stringify(pricingError.details)}` : '';

  return { stream: 'stderr', text: `${pricingError.code}: ${pricingError.message}${detailsText}` };
}
