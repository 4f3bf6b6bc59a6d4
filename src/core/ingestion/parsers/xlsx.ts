/**
 * XLSX (Excel) workbook reader using SheetJS
 */

import * as XLSX from 'xlsx';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { z } from 'zod';
import { ParseFailureError } from '../../../utils/errors.js';
import type { CellValue, TabularGrid, Workbook } from '../../../types/index.js';

const dateCodeSchema = z.object({
  y: z.number(),
  m: z.number(),
  d: z.number(),
  H: z.number(),
  M: z.number(),
  S: z.number(),
});

function isCellObject(value: unknown): value is XLSX.CellObject {
  return typeof value === 'object' && value !== null && 't' in value && typeof value.t === 'string';
}

const SECONDS_PER_DAY = 86400;

function isDateFormat(format: string): boolean {
  if (format === '') return false;
  const result: unknown = XLSX.SSF.is_date(format);
  return result === true;
}

// Quoted text, backslash escapes and `_x` / `*x` padding are literals, not tokens
function stripFormatLiterals(format: string): string {
  return format.replace(/"[^"]*"|\\.|_.|\*./g, '');
}

/**
 * `[h]:mm`, `[mm]:ss` and the like count elapsed time instead of time of day
 */
export function isElapsedFormat(format: string): boolean {
  return /\[(h+|m+|s+)\]/i.test(stripFormatLiterals(format));
}

/**
 * A format with hour/minute/second tokens but no year or day tokens
 */
export function isTimeOnlyFormat(format: string): boolean {
  const tokens = stripFormatLiterals(format).replace(/\[[^\]]*\]/g, '');
  if (/[yd]/i.test(tokens)) return false;
  return isElapsedFormat(format) || /[hs]/i.test(tokens);
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Render a day fraction as HH:mm:ss. Elapsed values keep hours past 24.
 */
export function formatTimeValue(serial: number, elapsed: boolean): string {
  let seconds = Math.round(serial * SECONDS_PER_DAY);
  if (!elapsed) {
    seconds = ((seconds % SECONDS_PER_DAY) + SECONDS_PER_DAY) % SECONDS_PER_DAY;
  }
  const sign = seconds < 0 ? '-' : '';
  seconds = Math.abs(seconds);
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${sign}${pad2(hours)}:${pad2(minutes)}:${pad2(seconds % 60)}`;
}

/**
 * Decode an Excel serial into a local calendar Date
 */
function serialToDate(serial: number): Date | null {
  const parsed = dateCodeSchema.safeParse(XLSX.SSF.parse_date_code(serial));
  if (!parsed.success) return null;
  const { y, m, d, H, M, S } = parsed.data;
  return new Date(y, m - 1, d, H, M, S);
}

/**
 * Map a SheetJS cell to a plain value. Errors and stubs count as missing;
 * time-only formats become `HH:mm:ss` strings rather than dates.
 */
export function toCellValue(cell: XLSX.CellObject | undefined): CellValue {
  if (!cell || cell.v === undefined) return null;

  switch (cell.t) {
    case 's':
      return String(cell.v);
    case 'b':
      return Boolean(cell.v);
    case 'n': {
      if (typeof cell.v !== 'number') return null;
      const format = typeof cell.z === 'string' ? cell.z : '';
      if (!isDateFormat(format)) return cell.v;
      return isTimeOnlyFormat(format)
        ? formatTimeValue(cell.v, isElapsedFormat(format))
        : serialToDate(cell.v);
    }
    case 'd':
      return cell.v instanceof Date ? cell.v : new Date(String(cell.v));
    default:
      return null;
  }
}

function headerText(cell: XLSX.CellObject | undefined): string {
  if (!cell || cell.v === undefined || cell.t === 'e' || cell.t === 'z') return '';
  return (cell.w ?? String(cell.v)).trim();
}

/**
 * Blank headers become "Unnamed: <n>", repeated ones get ".<k>" appended
 */
export function uniqueColumnNames(headers: string[]): string[] {
  const seen = new Map<string, number>();
  return headers.map((header, index) => {
    const name = header === '' ? `Unnamed: ${index}` : header;
    const count = seen.get(name) ?? 0;
    seen.set(name, count + 1);
    return count === 0 ? name : `${name}.${count}`;
  });
}

function isBlankRow(row: CellValue[]): boolean {
  return row.every(value => value === null || value === '');
}

/**
 * Convert a worksheet to a grid; the first row holds the column names
 */
export function sheetToGrid(worksheet: XLSX.WorkSheet): TabularGrid {
  const ref = worksheet['!ref'];
  if (!ref) {
    return { columns: [], rows: [] };
  }

  const range = XLSX.utils.decode_range(ref);
  const cellAt = (r: number, c: number): XLSX.CellObject | undefined => {
    const value: unknown = worksheet[XLSX.utils.encode_cell({ r, c })];
    return isCellObject(value) ? value : undefined;
  };

  const headers: string[] = [];
  for (let c = range.s.c; c <= range.e.c; c++) {
    headers.push(headerText(cellAt(range.s.r, c)));
  }

  const rows: CellValue[][] = [];
  for (let r = range.s.r + 1; r <= range.e.r; r++) {
    const row: CellValue[] = [];
    for (let c = range.s.c; c <= range.e.c; c++) {
      row.push(toCellValue(cellAt(r, c)));
    }
    if (!isBlankRow(row)) {
      rows.push(row);
    }
  }

  return { columns: uniqueColumnNames(headers), rows };
}

/**
 * Open a workbook file. Read and parse failures surface as ParseFailureError.
 */
export async function openWorkbook(filepath: string): Promise<Workbook> {
  let workbook: XLSX.WorkBook;
  try {
    const buffer = await readFile(filepath);
    workbook = XLSX.read(buffer, { type: 'buffer', cellNF: true });
  } catch (error) {
    throw new ParseFailureError(filepath, error);
  }

  return {
    fileName: basename(filepath),
    sheetNames: [...workbook.SheetNames],
    readSheet(sheetName: string): TabularGrid {
      const worksheet = workbook.Sheets[sheetName];
      if (!worksheet) {
        throw new ParseFailureError(filepath, new Error(`Sheet not found: ${sheetName}`));
      }
      try {
        return sheetToGrid(worksheet);
      } catch (error) {
        throw new ParseFailureError(filepath, error);
      }
    },
  };
}
