import { getBatchRuntimeConfig } from '../config/runtime-overrides.js';
import { parseBatchEstimateRequest } from '../domain/estimate-request.js';
import { estimateBatch } from '../pricing/estimate-requests.js';
import { renderBatchEstimate } from '../render/render-estimate.js';
import { logger } from '../utils/logger.js';
import type { CliContext, SharedCommandOptions } from './cli-context.js';
import { readJsonDocument } from './read-json-document.js';

export type BatchCommandOptions = SharedCommandOptions;

export async function buildBatchReport(
  filePath: string,
  context: CliContext,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  const { maxBatchSize } = getBatchRuntimeConfig(env);
  const batch = parseBatchEstimateRequest(await readJsonDocument(filePath), maxBatchSize);
  const response = estimateBatch(context.engine, batch);

  if (context.format === 'terminal') {
    const itemsLabel = batch.items.length === 1 ? 'item' : 'items';
    logger.info(
      `Estimated ${response.results.length} of ${batch.items.length} ${itemsLabel} with pricing ${response.pricing_version}`,
    );

    if (response.errors.length > 0) {
      logger.warn(`${response.errors.length} item(s) failed`);
    }
  }

  return renderBatchEstimate(response, { format: context.format });
}
