import { z } from 'zod';

import { SUPPORTED_BILLING_DIMENSIONS } from '../domain/billing-dimensions.js';
import { compareByCodePoint } from '../utils/compare-by-code-point.js';
import { RegistryLoadError } from './pricing-error.js';

const decimalValueSchema = z.union([
  z.number().nonnegative(),
  z.string().regex(/^\d+(\.\d+)?$/u, 'Expected a non-negative decimal string'),
]);

export const rateDocumentSchema = z.union([
  z.object({ per_1m: decimalValueSchema }).strict(),
  z.object({ per_unit: decimalValueSchema }).strict(),
]);

export const billableDocumentSchema = z.record(z.enum(SUPPORTED_BILLING_DIMENSIONS), rateDocumentSchema);

const pricingTierDocumentSchema = z
  .object({
    condition: z
      .object({
        dimension: z.string().min(1),
        gt: z.number().int().nonnegative(),
      })
      .strict(),
    billable: billableDocumentSchema,
  })
  .strict();

const modelDocumentSchema = z
  .object({
    model: z.string().min(1),
    effective_from: z.string().regex(/^\d{4}-\d{2}-\d{2}$/u, 'Expected a YYYY-MM-DD date'),
    billable: billableDocumentSchema,
    capabilities: z.array(z.string().min(1)).default([]),
    metadata: z.record(z.string(), z.unknown()).default({}),
    pricing_tiers: z.array(pricingTierDocumentSchema).default([]),
  })
  .strict();

export const providerDocumentSchema = z
  .object({
    provider: z.string().min(1),
    models: z.array(modelDocumentSchema),
    source: z.record(z.string(), z.unknown()).default({}),
  })
  .strict();

export const registryMetaDocumentSchema = z
  .object({
    pricing_version: z.string().min(1),
    currency: z.string().regex(/^[A-Z]{3}$/u, 'Expected an ISO 4217 currency code'),
    published_at: z.string().min(1),
    schema_version: z.number().int().positive(),
  })
  .strict();

export type RateDocument = z.infer<typeof rateDocumentSchema>;
export type BillableDocument = z.infer<typeof billableDocumentSchema>;
export type ProviderDocument = z.infer<typeof providerDocumentSchema>;
export type RegistryMetaDocument = z.infer<typeof registryMetaDocumentSchema>;

type IssuePath = readonly (string | number)[];

function compareIssuePaths(left: IssuePath, right: IssuePath): number {
  const sharedLength = Math.min(left.length, right.length);

  for (let index = 0; index < sharedLength; index += 1) {
    const leftPart = left[index];
    const rightPart = right[index];

    if (leftPart === rightPart) {
      continue;
    }

    if (typeof leftPart === 'number' && typeof rightPart === 'number') {
      return leftPart - rightPart;
    }

    return compareByCodePoint(String(leftPart), String(rightPart));
  }

  return left.length - right.length;
}

/**
 * Parses a registry document, failing on the first issue in path order.
 */
export function validateRegistryDocument<Schema extends z.ZodTypeAny>(
  schema: Schema,
  payload: unknown,
  fileName: string,
): z.infer<Schema> {
  const result = schema.safeParse(payload);

  if (result.success) {
    return result.data;
  }

  const [firstIssue] = [...result.error.issues].sort((left, right) =>
    compareIssuePaths(left.path, right.path),
  );
  const issuePath = firstIssue.path.join('.');
  const pathSuffix = issuePath ? ` at '${issuePath}'` : '';

  throw new RegistryLoadError(
    fileName,
    `Schema validation failed for ${fileName}${pathSuffix}: ${firstIssue.message}`,
  );
}
