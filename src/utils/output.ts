import chalk from 'chalk';

export const icons = {
  success: chalk.green('✔'),
  error: chalk.red('✖'),
  warning: chalk.yellow('⚠'),
  info: chalk.blue('ℹ'),
};

export function header(text: string): string {
  return chalk.bold.underline(text);
}

export function versionChange(oldVersion: string, newVersion: string): string {
  return `${chalk.dim(oldVersion)} -> ${chalk.green(newVersion)}`;
}

export function table(rows: string[][], columnGap = 2): string {
  if (rows.length === 0) return '';

  const colCount = Math.max(...rows.map((r) => r.length));
  const widths: number[] = [];

  for (let c = 0; c < colCount; c++) {
    widths[c] = Math.max(...rows.map((r) => visibleLength(r[c] ?? '')));
  }

  return rows
    .map((row) =>
      row
        .map((cell, i) =>
          i < row.length - 1
            ? cell + ' '.repeat(widths[i] - visibleLength(cell) + columnGap)
            : cell,
        )
        .join(''),
    )
    .join('\n');
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}
