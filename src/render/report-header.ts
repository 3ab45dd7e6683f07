import pc from 'picocolors';

export type ReportHeaderOptions = {
  title: string;
  subtitle?: string;
  useColor?: boolean;
};

function drawBoxLine(width: number, left: string, middle: string, right: string): string {
  return left + middle.repeat(width - 2) + right;
}

function padLine(content: string, width: number): string {
  const padding = width - 2 - content.length;
  const leftPad = Math.floor(padding / 2);
  const rightPad = padding - leftPad;
  return '│' + ' '.repeat(leftPad) + content + ' '.repeat(rightPad) + '│';
}

export function renderReportHeader(options: ReportHeaderOptions): string {
  const { title, subtitle, useColor = true } = options;
  // two spaces of padding on each side
  const boxWidth = Math.max(title.length, subtitle?.length ?? 0) + 4;
  const topBorder = drawBoxLine(boxWidth, '┌', '─', '┐');
  const titleLine = padLine(title, boxWidth);
  const bottomBorder = drawBoxLine(boxWidth, '└', '─', '┘');

  const lines = [useColor ? pc.gray(topBorder) : topBorder, useColor ? pc.white(titleLine) : titleLine];

  if (subtitle) {
    const subtitleLine = padLine(subtitle, boxWidth);
    lines.push(useColor ? pc.dim(subtitleLine) : subtitleLine);
  }

  lines.push(useColor ? pc.gray(bottomBorder) : bottomBorder);

  return lines.join('\n');
}
