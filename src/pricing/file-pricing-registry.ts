import { existsSync, readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { isBillingDimension, type BillingDimension } from '../domain/billing-dimensions.js';
import { asRecord, asStringRecord } from '../utils/as-record.js';
import { compareByCodePoint } from '../utils/compare-by-code-point.js';
import { formatDecimal, parseDecimal } from './decimal-amount.js';
import { RegistryLoadError } from './pricing-error.js';
import { createRate } from './rate.js';
import {
  providerDocumentSchema,
  registryMetaDocumentSchema,
  validateRegistryDocument,
  type BillableDocument,
  type ProviderDocument,
} from './registry-schema.js';
import type {
  ModelPricing,
  PricingRegistry,
  ProviderPricing,
  Rate,
  Ratecard,
  RegistryMeta,
} from './types.js';

const REGISTRY_META_FILE = 'registry_meta.json';
const PROVIDERS_DIR = 'providers';
const ALIASES_DIR = 'aliases';

const defaultRegistryDirCandidates = ['../../pricing', '../../../pricing'] as const;

export type FilePricingRegistryOptions = {
  rootDir?: string;
};

export type RegistryLoadSummary = {
  providerCount: number;
  modelCount: number;
  providerAliasCount: number;
  modelAliasCount: number;
};

type AliasIndex = {
  providerAliases: ReadonlyMap<string, string>;
  modelAliases: ReadonlyMap<string, ReadonlyMap<string, string>>;
};

type RegistryCache = {
  providers: Map<string, ProviderPricing>;
  aliases?: AliasIndex;
};

/**
 * Locates the bundled `pricing/` directory from either the source tree or the
 * compiled output.
 */
export function getDefaultRegistryDir(): string {
  const candidates = defaultRegistryDirCandidates.map((candidate) =>
    fileURLToPath(new URL(candidate, import.meta.url)),
  );

  return candidates.find((candidate) => existsSync(candidate)) ?? candidates[0];
}

/**
 * Follows an alias chain to its end. A cycle yields the original id.
 */
export function resolveAliasChain(aliases: ReadonlyMap<string, string>, id: string): string {
  const visited = new Set<string>();
  let resolved = id;

  for (;;) {
    if (visited.has(resolved)) {
      return id;
    }

    visited.add(resolved);
    const next = aliases.get(resolved);

    if (next === undefined) {
      return resolved;
    }

    resolved = next;
  }
}

function getNodeErrorCode(error: unknown): string | undefined {
  const record = asRecord(error);
  return typeof record?.code === 'string' ? record.code : undefined;
}

function listJsonFiles(directory: string): string[] {
  try {
    return readdirSync(directory, { withFileTypes: true })
      .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
      .map((entry) => entry.name)
      .sort(compareByCodePoint)
      .map((fileName) => path.join(directory, fileName));
  } catch (error) {
    if (getNodeErrorCode(error) === 'ENOENT') {
      return [];
    }

    throw error;
  }
}

function readJsonFile(filePath: string): unknown {
  const fileName = path.basename(filePath);
  let content: string;

  try {
    content = readFileSync(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RegistryLoadError(fileName, `Could not read ${fileName}: ${reason}`, {
      cause: error,
    });
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RegistryLoadError(fileName, `Invalid JSON in ${fileName}: ${reason}`, {
      cause: error,
    });
  }
}

function toRateText(value: number | string): string {
  if (typeof value === 'string') {
    return value;
  }

  const amount = parseDecimal(String(value));
  return amount ? formatDecimal(amount) : String(value);
}

function parseRatecard(billable: BillableDocument, fileName: string): Ratecard {
  const ratecard: Partial<Record<BillingDimension, Rate>> = {};

  for (const [dimension, rateDocument] of Object.entries(billable)) {
    if (!rateDocument || !isBillingDimension(dimension)) {
      continue;
    }

    const rate =
      'per_1m' in rateDocument
        ? createRate('per_1m', toRateText(rateDocument.per_1m))
        : createRate('per_unit', toRateText(rateDocument.per_unit));

    if (!rate) {
      throw new RegistryLoadError(fileName, `Invalid rate for '${dimension}' in ${fileName}`);
    }

    ratecard[dimension] = rate;
  }

  return ratecard;
}

function parseModels(
  document: ProviderDocument,
  fileName: string,
): ReadonlyMap<string, ModelPricing> {
  const models = new Map<string, ModelPricing>();

  for (const modelDocument of document.models) {
    if (models.has(modelDocument.model)) {
      throw new RegistryLoadError(
        fileName,
        `Duplicate model '${modelDocument.model}' in ${fileName}`,
      );
    }

    models.set(modelDocument.model, {
      model: modelDocument.model,
      effectiveFrom: modelDocument.effective_from,
      ratecard: parseRatecard(modelDocument.billable, fileName),
      tiers: modelDocument.pricing_tiers.map((tier) => ({
        condition: { dimension: tier.condition.dimension, threshold: tier.condition.gt },
        ratecard: parseRatecard(tier.billable, fileName),
      })),
      capabilities: modelDocument.capabilities,
      metadata: modelDocument.metadata,
    });
  }

  return models;
}

function loadRegistryMeta(rootDir: string): RegistryMeta {
  const document = validateRegistryDocument(
    registryMetaDocumentSchema,
    readJsonFile(path.join(rootDir, REGISTRY_META_FILE)),
    REGISTRY_META_FILE,
  );

  return {
    pricingVersion: document.pricing_version,
    currency: document.currency,
    publishedAt: document.published_at,
    schemaVersion: document.schema_version,
  };
}

function discoverProviderFiles(rootDir: string): ReadonlyMap<string, string> {
  const files = listJsonFiles(path.join(rootDir, PROVIDERS_DIR));
  return new Map(files.map((filePath) => [path.basename(filePath, '.json'), filePath]));
}

function loadAliasIndex(rootDir: string): AliasIndex {
  const providerAliases = new Map<string, string>();
  const modelAliases = new Map<string, ReadonlyMap<string, string>>();

  for (const aliasFile of listJsonFiles(path.join(rootDir, ALIASES_DIR))) {
    const document = asRecord(readJsonFile(aliasFile));

    if (!document) {
      continue;
    }

    const provider = document.provider;
    const aliases = asStringRecord(document.aliases);

    if (typeof provider === 'string' && aliases) {
      modelAliases.set(provider, new Map(Object.entries(aliases)));
    }

    for (const [alias, canonical] of Object.entries(asStringRecord(document.provider_aliases) ?? {})) {
      providerAliases.set(alias, canonical);
    }
  }

  return { providerAliases, modelAliases };
}

/**
 * Registry backed by a directory of JSON documents. Metadata is read on
 * construction; provider documents and alias maps are parsed on first use and
 * kept for the lifetime of the instance.
 */
export class FilePricingRegistry implements PricingRegistry {
  public readonly rootDir: string;
  public readonly meta: RegistryMeta;

  private readonly providerFiles: ReadonlyMap<string, string>;
  private readonly cache: RegistryCache = { providers: new Map() };

  public constructor(options: FilePricingRegistryOptions = {}) {
    this.rootDir = options.rootDir ?? getDefaultRegistryDir();
    this.meta = loadRegistryMeta(this.rootDir);
    this.providerFiles = discoverProviderFiles(this.rootDir);
  }

  public get pricingVersion(): string {
    return this.meta.pricingVersion;
  }

  public get currency(): string {
    return this.meta.currency;
  }

  public listProviders(): string[] {
    return [...this.providerFiles.keys()].sort(compareByCodePoint);
  }

  public getProvider(provider: string): ProviderPricing | undefined {
    const canonicalProvider = this.resolveProvider(provider);
    const cached = this.cache.providers.get(canonicalProvider);

    if (cached) {
      return cached;
    }

    const filePath = this.providerFiles.get(canonicalProvider);

    if (!filePath) {
      return undefined;
    }

    const loaded = this.loadProviderFile(filePath);
    this.cache.providers.set(canonicalProvider, loaded);
    return loaded;
  }

  public resolveProvider(provider: string): string {
    return resolveAliasChain(this.getAliasIndex().providerAliases, provider);
  }

  public resolveModel(provider: string, model: string): string {
    const canonicalProvider = this.resolveProvider(provider);
    const providerModelAliases = this.getAliasIndex().modelAliases.get(canonicalProvider);
    return providerModelAliases?.get(model) ?? model;
  }

  public getModel(provider: string, model: string): ModelPricing | undefined {
    const providerPricing = this.getProvider(provider);

    if (!providerPricing) {
      return undefined;
    }

    return providerPricing.models.get(this.resolveModel(provider, model));
  }

  public listModels(provider: string): ModelPricing[] {
    const providerPricing = this.getProvider(provider);

    if (!providerPricing) {
      return [];
    }

    return [...providerPricing.models.keys()]
      .sort(compareByCodePoint)
      .flatMap((modelId) => providerPricing.models.get(modelId) ?? []);
  }

  /** Parses every provider and alias document now instead of on first use. */
  public loadAll(): RegistryLoadSummary {
    const aliasIndex = this.getAliasIndex();
    let modelCount = 0;

    for (const provider of this.listProviders()) {
      modelCount += this.getProvider(provider)?.models.size ?? 0;
    }

    let modelAliasCount = 0;

    for (const providerModelAliases of aliasIndex.modelAliases.values()) {
      modelAliasCount += providerModelAliases.size;
    }

    return {
      providerCount: this.providerFiles.size,
      modelCount,
      providerAliasCount: aliasIndex.providerAliases.size,
      modelAliasCount,
    };
  }

  private getAliasIndex(): AliasIndex {
    if (!this.cache.aliases) {
      this.cache.aliases = loadAliasIndex(this.rootDir);
    }

    return this.cache.aliases;
  }

  private loadProviderFile(filePath: string): ProviderPricing {
    const fileName = path.basename(filePath);
    const document = validateRegistryDocument(
      providerDocumentSchema,
      readJsonFile(filePath),
      fileName,
    );

    return {
      provider: document.provider,
      models: parseModels(document, fileName),
      source: document.source,
    };
  }
}
