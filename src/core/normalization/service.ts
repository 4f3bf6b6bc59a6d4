/**
 * Table normalization - cleans a raw grid before it is rendered
 */

import type { CellValue, TabularGrid } from '../../types/index.js';

/**
 * Number of leading columns forward-filled to approximate merged cells
 */
export const FORWARD_FILL_COLUMNS = 2;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function formatIsoDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function formatIsoDateTime(date: Date): string {
  return `${formatIsoDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function isMissing(value: CellValue | undefined): value is null | undefined {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

/**
 * A column is date-typed when it holds at least one value and every value is a Date
 */
function isDateColumn(rows: CellValue[][], columnIndex: number): boolean {
  let seen = false;
  for (const row of rows) {
    const value = row[columnIndex];
    if (isMissing(value) || value === '') continue;
    if (!(value instanceof Date)) return false;
    seen = true;
  }
  return seen;
}

function formatDate(value: Date, dateOnly: boolean): string {
  if (Number.isNaN(value.getTime())) return '';
  return dateOnly ? formatIsoDate(value) : formatIsoDateTime(value);
}

/**
 * Clean a grid for rendering:
 * - missing cells become ''
 * - date columns become YYYY-MM-DD (dates in mixed columns keep their time)
 * - the first two columns are forward-filled
 *
 * Returns a new grid; the input is never modified.
 */
export function normalizeGrid(grid: TabularGrid): TabularGrid {
  const columnCount = grid.columns.length;
  const dateColumns = grid.columns.map((_, index) => isDateColumn(grid.rows, index));

  const rows: CellValue[][] = grid.rows.map(row =>
    grid.columns.map((_, index) => {
      const value = row[index];
      if (isMissing(value)) return '';
      if (value instanceof Date) return formatDate(value, dateColumns[index] ?? false);
      return value;
    })
  );

  const fillCount = Math.min(FORWARD_FILL_COLUMNS, columnCount);
  for (let col = 0; col < fillCount; col++) {
    let last: CellValue = '';
    for (const row of rows) {
      if (row[col] === '') {
        row[col] = last;
      } else {
        last = row[col];
      }
    }
  }

  return { columns: [...grid.columns], rows };
}
