export const SUPPORTED_BILLING_DIMENSIONS = [
  'input_tokens_uncached',
  'input_tokens_cached',
  'output_tokens',
  'reasoning_tokens',
  'embedding_tokens',
  'tool_calls',
  'image_count',
  'image_megapixels',
  'audio_input_seconds',
  'audio_output_seconds',
  'requests',
] as const;

export type BillingDimension = (typeof SUPPORTED_BILLING_DIMENSIONS)[number];

/** Synthetic tier-condition key: uncached plus cached input tokens. */
export const CONTEXT_TOKENS_DIMENSION = 'context_tokens';

export const MAX_DIMENSION_QUANTITY = 10_000_000_000;
export const MAX_BATCH_SIZE = 100;

const supportedDimensionSet: ReadonlySet<string> = new Set(SUPPORTED_BILLING_DIMENSIONS);

export function isBillingDimension(value: string): value is BillingDimension {
  return supportedDimensionSet.has(value);
}

export type UsageQuantities = Readonly<Record<string, number>>;

export function resolveUsageValue(dimension: string, usage: UsageQuantities): number {
  if (dimension === CONTEXT_TOKENS_DIMENSION) {
    return (usage.input_tokens_uncached ?? 0) + (usage.input_tokens_cached ?? 0);
  }

  return usage[dimension] ?? 0;
}
