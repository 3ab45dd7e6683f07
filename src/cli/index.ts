#!/usr/bin/env node

import { logger } from '../utils/logger.js';
import { createCli } from './create-cli.js';
import { loadPackageMetadataFromRuntime } from './package-metadata.js';

const { packageVersion } = loadPackageMetadataFromRuntime();

const cli = createCli({ version: packageVersion });

try {
  await cli.parseAsync(process.argv);
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(message);
  process.exitCode = 1;
}
