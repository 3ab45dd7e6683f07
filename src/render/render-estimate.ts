import { markdownTable } from 'markdown-table';
import pc from 'picocolors';

import type { BatchEstimateResponse, EstimateResponse } from '../domain/estimate-response.js';
import { renderJson, type OutputFormat } from './output-format.js';
import { renderReportHeader } from './report-header.js';
import { renderUnicodeTable, shouldUseColorByDefault, type ColumnAlignment } from './unicode-table.js';

export type RenderEstimateOptions = {
  format: OutputFormat;
  useColor?: boolean;
};

const integerFormatter = new Intl.NumberFormat('en-US');

const breakdownAlignments: ColumnAlignment[] = ['left', 'right', 'right', 'right'];

function breakdownHeaders(currency: string): string[] {
  return ['Dimension', 'Quantity', 'Rate', `Cost (${currency})`];
}

function toBreakdownRows(response: EstimateResponse): string[][] {
  return response.breakdown.map((item) => [
    item.dimension,
    integerFormatter.format(item.quantity),
    item.rate,
    item.cost,
  ]);
}

function estimateTitle(response: EstimateResponse): string {
  if (response.provider === response.model) {
    return `Cost Estimate: ${response.model}`;
  }

  return `Cost Estimate: ${response.provider} / ${response.model}`;
}

function estimateSubtitle(response: EstimateResponse): string {
  return `Pricing ${response.pricing_version} · engine ${response.meta.engine_version}`;
}

function renderWarningLines(warnings: readonly string[], useColor: boolean): string[] {
  if (warnings.length === 0) {
    return [];
  }

  const label = useColor ? pc.yellow('Warnings:') : 'Warnings:';
  return ['', label, ...warnings.map((warning) => `  - ${warning}`)];
}

function renderTerminalEstimate(response: EstimateResponse, useColor: boolean): string {
  const table = renderUnicodeTable({
    headerCells: breakdownHeaders(response.total.currency),
    bodyRows: toBreakdownRows(response),
    footerRows: [['TOTAL', '', '', response.total.cost]],
    alignments: breakdownAlignments,
    useColor,
  });

  return [
    renderReportHeader({
      title: estimateTitle(response),
      subtitle: estimateSubtitle(response),
      useColor,
    }),
    '',
    table,
    ...renderWarningLines(response.warnings, useColor),
  ].join('\n');
}

function renderMarkdownEstimate(response: EstimateResponse): string {
  const table = markdownTable(
    [
      breakdownHeaders(response.total.currency),
      ...toBreakdownRows(response),
      ['**TOTAL**', '', '', `**${response.total.cost}**`],
    ],
    { align: ['l', 'r', 'r', 'r'] },
  );
  const lines = [`### ${estimateTitle(response)}`, '', estimateSubtitle(response), '', table];

  if (response.warnings.length > 0) {
    lines.push('', ...response.warnings.map((warning) => `> ${warning}`));
  }

  return lines.join('\n');
}

export function renderEstimate(response: EstimateResponse, options: RenderEstimateOptions): string {
  switch (options.format) {
    case 'json':
      return renderJson(response);
    case 'markdown':
      return renderMarkdownEstimate(response);
    case 'terminal':
      return renderTerminalEstimate(response, options.useColor ?? shouldUseColorByDefault());
  }
}

function renderBatchErrorLine(batchError: BatchEstimateResponse['errors'][number]): string {
  return `#${batchError.index}: ${batchError.error.code} ${batchError.error.message}`;
}

export function renderBatchEstimate(
  response: BatchEstimateResponse,
  options: RenderEstimateOptions,
): string {
  if (options.format === 'json') {
    return renderJson(response);
  }

  const sections = response.results.map((result) => renderEstimate(result, options));

  if (response.errors.length > 0) {
    const heading = options.format === 'markdown' ? '### Failed items' : 'Failed items:';
    const bullet = options.format === 'markdown' ? '- ' : '  ';
    sections.push(
      [heading, ...response.errors.map((item) => `${bullet}${renderBatchErrorLine(item)}`)].join(
        '\n',
      ),
    );
  }

  return sections.join('\n\n');
}
