import { createRequire } from 'node:module';

import { asRecord } from '../utils/as-record.js';

export type PackageMetadata = {
  packageName: string;
  packageVersion: string;
};

const DEFAULT_PACKAGE_NAME = 'llm-cost-estimator';
const DEFAULT_PACKAGE_VERSION = '0.0.0';

// src/cli when run from sources, dist/src/cli once compiled
const defaultPackageJsonCandidates = ['../../package.json', '../../../package.json'] as const;

type JsonLoader = (path: string) => unknown;

function readTrimmedString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function normalizeMetadata(candidate: unknown): PackageMetadata | undefined {
  const packageJson = asRecord(candidate);
  const packageName = readTrimmedString(packageJson?.name);
  const packageVersion = readTrimmedString(packageJson?.version);

  if (!packageName || !packageVersion) {
    return undefined;
  }

  return { packageName, packageVersion };
}

export function resolvePackageMetadata(
  loadJson: JsonLoader,
  packageJsonCandidates: readonly string[] = defaultPackageJsonCandidates,
): PackageMetadata {
  for (const candidatePath of packageJsonCandidates) {
    let candidate: unknown;

    try {
      candidate = loadJson(candidatePath);
    } catch {
      continue;
    }

    const metadata = normalizeMetadata(candidate);

    if (metadata) {
      return metadata;
    }
  }

  return {
    packageName: DEFAULT_PACKAGE_NAME,
    packageVersion: DEFAULT_PACKAGE_VERSION,
  };
}

export function loadPackageMetadataFromRuntime(): PackageMetadata {
  const require = createRequire(import.meta.url);
  return resolvePackageMetadata((candidatePath) => require(candidatePath));
}
