/**
 * Markdown pipe-table rendering
 */

import type { CellValue, TabularGrid } from '../../types/index.js';

/**
 * Convert a cell to its table text: pipes escaped, line breaks as <br>
 */
export function formatCell(value: CellValue): string {
  if (value === null) return '';
  const text = value instanceof Date ? value.toISOString() : String(value);
  return text
    .replace(/\|/g, '\\|')
    .replace(/\r\n|\r|\n/g, '<br>')
    .trim();
}

function renderRow(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}

/**
 * Render a grid as a GitHub-flavored pipe table (header, separator, rows)
 * with no row-index column and no trailing newline
 */
export function renderMarkdownTable(grid: TabularGrid): string {
  const lines = [
    renderRow(grid.columns.map(formatCell)),
    renderRow(grid.columns.map(() => '---')),
    ...grid.rows.map(row => renderRow(grid.columns.map((_, index) => formatCell(row[index] ?? null)))),
  ];
  return lines.join('\n');
}
