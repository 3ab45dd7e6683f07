import { markdownTable } from 'markdown-table';

import type { ModelsResponse, ProvidersResponse, VersionsResponse } from '../pricing/catalog.js';
import { renderJson, type OutputFormat } from './output-format.js';
import { renderReportHeader } from './report-header.js';
import { renderUnicodeTable, shouldUseColorByDefault, type ColumnAlignment } from './unicode-table.js';

export type RenderCatalogOptions = {
  format: OutputFormat;
  useColor?: boolean;
};

type CatalogTable = {
  title: string;
  subtitle: string;
  headerCells: string[];
  bodyRows: string[][];
  alignments: ColumnAlignment[];
};

function formatList(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : '-';
}

function formatRates(billable: ModelsResponse['models'][number]['billable']): string {
  const entries = Object.entries(billable ?? {}).map(([dimension, rate]) => {
    const perMillion = rate.per_1m;
    return perMillion !== undefined
      ? `${dimension}=${perMillion}/1M`
      : `${dimension}=${rate.per_unit ?? '?'}/unit`;
  });

  return formatList(entries);
}

function renderCatalogTable(table: CatalogTable, options: RenderCatalogOptions): string {
  if (options.format === 'markdown') {
    return [
      `### ${table.title}`,
      '',
      table.subtitle,
      '',
      markdownTable([table.headerCells, ...table.bodyRows], {
        align: table.alignments.map((alignment) => (alignment === 'right' ? 'r' : 'l')),
      }),
    ].join('\n');
  }

  const useColor = options.useColor ?? shouldUseColorByDefault();

  return [
    renderReportHeader({ title: table.title, subtitle: table.subtitle, useColor }),
    '',
    renderUnicodeTable({
      headerCells: table.headerCells,
      bodyRows: table.bodyRows,
      alignments: table.alignments,
      useColor,
    }),
  ].join('\n');
}

export function renderProviders(response: ProvidersResponse, options: RenderCatalogOptions): string {
  if (options.format === 'json') {
    return renderJson(response);
  }

  return renderCatalogTable(
    {
      title: 'Providers',
      subtitle: `Pricing ${response.pricing_version}`,
      headerCells: ['Provider', 'Models', 'Capabilities'],
      bodyRows: response.providers.map((provider) => [
        provider.provider,
        String(provider.model_count),
        formatList(provider.capabilities),
      ]),
      alignments: ['left', 'right', 'left'],
    },
    options,
  );
}

export function renderModels(response: ModelsResponse, options: RenderCatalogOptions): string {
  if (options.format === 'json') {
    return renderJson(response);
  }

  const includeRates = response.models.some((model) => model.billable !== undefined);
  const headerCells = ['Model', 'Effective From', 'Capabilities'];
  const alignments: ColumnAlignment[] = ['left', 'left', 'left'];

  if (includeRates) {
    headerCells.push('Rates');
    alignments.push('left');
  }

  return renderCatalogTable(
    {
      title: `Models: ${response.provider}`,
      subtitle: `Pricing ${response.pricing_version}`,
      headerCells,
      bodyRows: response.models.map((model) => {
        const cells = [model.model, model.effective_from, formatList(model.capabilities)];
        return includeRates ? [...cells, formatRates(model.billable)] : cells;
      }),
      alignments,
    },
    options,
  );
}

export function renderVersions(response: VersionsResponse, options: RenderCatalogOptions): string {
  if (options.format === 'json') {
    return renderJson(response);
  }

  return renderCatalogTable(
    {
      title: 'Pricing Registry',
      subtitle: `Engine ${response.engine_version}`,
      headerCells: ['Pricing Version', 'Currency', 'Published', 'Schema'],
      bodyRows: [
        [
          response.pricing_version,
          response.currency,
          response.published_at,
          String(response.schema_version),
        ],
      ],
      alignments: ['left', 'left', 'left', 'right'],
    },
    options,
  );
}
