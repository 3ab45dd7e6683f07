import pc from 'picocolors';

export type ColumnAlignment = 'left' | 'right';

export type UnicodeTableOptions = {
  headerCells: readonly string[];
  bodyRows: readonly (readonly string[])[];
  footerRows?: readonly (readonly string[])[];
  alignments: readonly ColumnAlignment[];
  useColor?: boolean;
};

type BorderChars = {
  left: string;
  join: string;
  right: string;
};

const ANSI_PATTERN = new RegExp(String.raw`\u001b\[[0-9;]*m`, 'gu');

const topBorder: BorderChars = { left: '┌', join: '┬', right: '┐' };
const middleBorder: BorderChars = { left: '├', join: '┼', right: '┤' };
const bottomBorder: BorderChars = { left: '└', join: '┴', right: '┘' };

export function visibleWidth(value: string): number {
  return [...value.replace(ANSI_PATTERN, '')].length;
}

export function shouldUseColorByDefault(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  if (process.env.FORCE_COLOR !== undefined) {
    return process.env.FORCE_COLOR !== '0';
  }

  return process.stdout.isTTY === true;
}

function alignCell(value: string, width: number, alignment: ColumnAlignment): string {
  const padding = ' '.repeat(Math.max(0, width - visibleWidth(value)));
  return alignment === 'right' ? `${padding}${value}` : `${value}${padding}`;
}

function measureColumns(rows: readonly (readonly string[])[], columnCount: number): number[] {
  return Array.from({ length: columnCount }, (_, columnIndex) =>
    rows.reduce((width, row) => Math.max(width, visibleWidth(row[columnIndex] ?? '')), 0),
  );
}

export function renderUnicodeTable(options: UnicodeTableOptions): string {
  const useColor = options.useColor ?? false;
  const footerRows = options.footerRows ?? [];
  const columnCount = options.headerCells.length;
  const widths = measureColumns(
    [options.headerCells, ...options.bodyRows, ...footerRows],
    columnCount,
  );

  const drawBorder = (chars: BorderChars): string => {
    const line = chars.left + widths.map((width) => '─'.repeat(width + 2)).join(chars.join) + chars.right;
    return useColor ? pc.gray(line) : line;
  };

  const drawRow = (cells: readonly string[], style?: (value: string) => string): string => {
    const separator = useColor ? pc.gray('│') : '│';
    const renderedCells = widths.map((width, columnIndex) => {
      const cell = cells[columnIndex] ?? '';
      const styledCell = useColor && style ? style(cell) : cell;
      return ` ${alignCell(styledCell, width, options.alignments[columnIndex] ?? 'left')} `;
    });

    return `${separator}${renderedCells.join(separator)}${separator}`;
  };

  const lines = [
    drawBorder(topBorder),
    drawRow(options.headerCells, (value) => pc.bold(pc.white(value))),
    drawBorder(middleBorder),
    ...options.bodyRows.map((row) => drawRow(row)),
  ];

  if (footerRows.length > 0) {
    lines.push(drawBorder(middleBorder), ...footerRows.map((row) => drawRow(row, pc.bold)));
  }

  lines.push(drawBorder(bottomBorder));

  return lines.join('\n');
}
