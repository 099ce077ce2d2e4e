import type { Cell, Outcome } from './interpreter.js';

export const NO_RESULTS_MESSAGE = 'No results found.';
const MAX_CELL_WIDTH = 60;

function formatCell(value: Cell | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text = String(value).replace(/\s+/g, ' ');
  return text.length > MAX_CELL_WIDTH ? `${text.slice(0, MAX_CELL_WIDTH - 3)}...` : text;
}

function formatLine(cells: string[], widths: number[]): string {
  return cells
    .map((cell, i) => cell.padEnd(widths[i]))
    .join('  ')
    .trimEnd();
}

/**
 * Format an outcome for the terminal
 */
export function render(outcome: Outcome, emptyMessage: string = NO_RESULTS_MESSAGE): string {
  switch (outcome.type) {
    case 'empty':
      return emptyMessage;

    case 'failure':
      return `[${outcome.kind}] ${outcome.message}`;

    case 'rows': {
      const columns = Object.keys(outcome.rows[0]);
      const body = outcome.rows.map((row) => columns.map((column) => formatCell(row[column])));
      const widths = columns.map((column, i) =>
        Math.max(column.length, ...body.map((cells) => cells[i].length))
      );

      const lines = [
        formatLine(columns, widths),
        '-'.repeat(widths.reduce((a, b) => a + b + 2, 0) - 2),
        ...body.map((cells) => formatLine(cells, widths)),
        '',
        `(${outcome.rows.length} ${outcome.rows.length === 1 ? 'row' : 'rows'})`,
      ];
      return lines.join('\n');
    }
  }
}
