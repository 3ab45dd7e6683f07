import { readFile } from 'node:fs/promises';

import { PricingError } from '../pricing/pricing-error.js';

export async function readJsonDocument(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PricingError('INVALID_REQUEST', 'Could not read request file', {
      details: { file: filePath, reason },
    });
  }

  try {
    const payload: unknown = JSON.parse(content);
    return payload;
  } catch {
    throw new PricingError('INVALID_REQUEST', 'Request file is not valid JSON', {
      details: { file: filePath },
    });
  }
}
