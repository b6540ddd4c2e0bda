import chalk from 'chalk';

export const icons = {
  success: chalk.green('✔'),
  warning: chalk.yellow('⚠'),
};

export function header(text: string): string {
  return chalk.bold.underline(text);
}

export function label(text: string): string {
  return chalk.dim(text);
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

/** Left-aligned columns; widths ignore ANSI styling. */
export function table(rows: string[][], columnGap = 2): string {
  if (rows.length === 0) return '';

  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, c) => {
      widths[c] = Math.max(widths[c] ?? 0, visibleLength(cell));
    });
  }

  return rows
    .map((row) =>
      row
        .map((cell, c) =>
          c < row.length - 1
            ? cell + ' '.repeat(widths[c] - visibleLength(cell) + columnGap)
            : cell,
        )
        .join(''),
    )
    .join('\n');
}
