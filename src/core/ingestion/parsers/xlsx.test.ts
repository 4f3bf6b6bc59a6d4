/**
 * Tests for XLSX workbook reader
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as XLSX from 'xlsx';

// Mock fs/promises
const mockReadFile = vi.fn();
vi.mock('fs/promises', () => ({
  readFile: (...args: unknown[]) => mockReadFile(...args),
}));

// Keep the real SheetJS, but let tests make read() fail
vi.mock('xlsx', async (importOriginal) => {
  const actual = await importOriginal<typeof import('xlsx')>();
  return { ...actual, read: vi.fn(actual.read) };
});

import {
  formatTimeValue,
  isElapsedFormat,
  isTimeOnlyFormat,
  openWorkbook,
  sheetToGrid,
  toCellValue,
  uniqueColumnNames,
} from './xlsx.js';
import { isSupportedSpreadsheet } from './index.js';
import { normalizeGrid } from '../../normalization/service.js';
import { ParseFailureError } from '../../../utils/errors.js';

function workbookBuffer(sheets: Record<string, XLSX.WorkSheet>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, sheet] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, sheet, name);
  }
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

describe('XLSX Reader', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('toCellValue', () => {
    it('should pass strings, numbers and booleans through', () => {
      expect(toCellValue({ t: 's', v: 'text' })).toBe('text');
      expect(toCellValue({ t: 'n', v: 42 })).toBe(42);
      expect(toCellValue({ t: 'n', v: 1234.5, z: '0.00' })).toBe(1234.5);
      expect(toCellValue({ t: 'b', v: false })).toBe(false);
    });

    it('should decode numbers with a date format into local dates', () => {
      expect(toCellValue({ t: 'n', v: 45296, z: 'yyyy-mm-dd' })).toEqual(new Date(2024, 0, 5));
      expect(toCellValue({ t: 'n', v: 45296.5, z: 'm/d/yy h:mm' })).toEqual(new Date(2024, 0, 5, 12, 0, 0));
    });

    it('should read time-only formats as times of day', () => {
      expect(toCellValue({ t: 'n', v: 0.375, z: 'h:mm' })).toBe('09:00:00');
      expect(toCellValue({ t: 'n', v: 0.625, z: 'h:mm:ss' })).toBe('15:00:00');
      expect(toCellValue({ t: 'n', v: 0.5, z: 'h:mm AM/PM' })).toBe('12:00:00');
    });

    it('should keep hours past a day for elapsed formats', () => {
      expect(toCellValue({ t: 'n', v: 1.5, z: '[h]:mm' })).toBe('36:00:00');
    });

    it('should pass date cells through', () => {
      const date = new Date(2024, 0, 5);
      expect(toCellValue({ t: 'd', v: date })).toBe(date);
    });

    it('should treat errors, stubs and missing cells as null', () => {
      expect(toCellValue({ t: 'e', v: 42, w: '#N/A' })).toBeNull();
      expect(toCellValue({ t: 'z' })).toBeNull();
      expect(toCellValue(undefined)).toBeNull();
    });
  });

  describe('Time Formats', () => {
    it('should tell time-only formats from date formats', () => {
      expect(isTimeOnlyFormat('h:mm')).toBe(true);
      expect(isTimeOnlyFormat('mm:ss')).toBe(true);
      expect(isTimeOnlyFormat('[h]:mm')).toBe(true);
      expect(isTimeOnlyFormat('[$-409]h:mm AM/PM')).toBe(true);
      expect(isTimeOnlyFormat('yyyy-mm-dd')).toBe(false);
      expect(isTimeOnlyFormat('m/d/yy h:mm')).toBe(false);
      expect(isTimeOnlyFormat('mmm')).toBe(false);
    });

    it('should detect elapsed formats only inside brackets', () => {
      expect(isElapsedFormat('[h]:mm:ss')).toBe(true);
      expect(isElapsedFormat('[mm]:ss')).toBe(true);
      expect(isElapsedFormat('h:mm')).toBe(false);
      expect(isElapsedFormat('[Red]h:mm')).toBe(false);
    });

    it('should wrap times of day and round to the second', () => {
      expect(formatTimeValue(0, false)).toBe('00:00:00');
      expect(formatTimeValue(1.25, false)).toBe('06:00:00');
      expect(formatTimeValue(1.25, true)).toBe('30:00:00');
      expect(formatTimeValue(1 / 86400 + 0.4 / 86400, false)).toBe('00:00:01');
    });

    it('should keep an h:mm column as times through normalization', () => {
      const sheet: XLSX.WorkSheet = {
        '!ref': 'A1:B3',
        A1: { t: 's', v: 'Meeting' },
        B1: { t: 's', v: 'Start' },
        A2: { t: 's', v: 'standup' },
        B2: { t: 'n', v: 0.375, z: 'h:mm' },
        A3: { t: 's', v: 'review' },
        B3: { t: 'n', v: 0.625, z: 'h:mm' },
      };

      expect(normalizeGrid(sheetToGrid(sheet)).rows).toEqual([
        ['standup', '09:00:00'],
        ['review', '15:00:00'],
      ]);
    });
  });

  describe('uniqueColumnNames', () => {
    it('should name blank headers and number duplicates', () => {
      expect(uniqueColumnNames(['ID', '', 'Name', 'Name', 'ID', ''])).toEqual([
        'ID',
        'Unnamed: 1',
        'Name',
        'Name.1',
        'ID.1',
        'Unnamed: 5',
      ]);
    });
  });

  describe('sheetToGrid', () => {
    it('should use the first row as columns and the rest as rows', () => {
      const sheet: XLSX.WorkSheet = {
        '!ref': 'A1:C3',
        A1: { t: 's', v: 'Category' },
        B1: { t: 's', v: 'Item' },
        C1: { t: 's', v: 'Due' },
        A2: { t: 's', v: 'Login' },
        B2: { t: 's', v: 'Password' },
        C2: { t: 'n', v: 45296, z: 'yyyy-mm-dd' },
        B3: { t: 's', v: 'Lockout' },
      };

      expect(sheetToGrid(sheet)).toEqual({
        columns: ['Category', 'Item', 'Due'],
        rows: [
          ['Login', 'Password', new Date(2024, 0, 5)],
          [null, 'Lockout', null],
        ],
      });
    });

    it('should drop fully blank rows', () => {
      const sheet: XLSX.WorkSheet = {
        '!ref': 'A1:B4',
        A1: { t: 's', v: 'A' },
        B1: { t: 's', v: 'B' },
        A2: { t: 's', v: 'x' },
        A3: { t: 's', v: '' },
        B4: { t: 'n', v: 1 },
      };

      expect(sheetToGrid(sheet).rows).toEqual([
        ['x', null],
        [null, 1],
      ]);
    });

    it('should return an empty grid for a sheet without a range', () => {
      expect(sheetToGrid({})).toEqual({ columns: [], rows: [] });
    });

    it('should return columns only for a header-only sheet', () => {
      const sheet = XLSX.utils.aoa_to_sheet([['ID', 'Title']]);

      expect(sheetToGrid(sheet)).toEqual({ columns: ['ID', 'Title'], rows: [] });
    });
  });

  describe('openWorkbook', () => {
    it('should list sheets in workbook order and read each one', async () => {
      mockReadFile.mockResolvedValue(
        workbookBuffer({
          Defects: XLSX.utils.aoa_to_sheet([
            ['ID', 'Title'],
            [1, 'Crash'],
          ]),
          Notes: XLSX.utils.aoa_to_sheet([['Memo'], ['check later']]),
        })
      );

      const workbook = await openWorkbook('/data/欠陥管理表.xlsx');

      expect(mockReadFile).toHaveBeenCalledWith('/data/欠陥管理表.xlsx');
      expect(workbook.fileName).toBe('欠陥管理表.xlsx');
      expect(workbook.sheetNames).toEqual(['Defects', 'Notes']);
      expect(workbook.readSheet('Defects')).toEqual({ columns: ['ID', 'Title'], rows: [[1, 'Crash']] });
      expect(workbook.readSheet('Notes')).toEqual({ columns: ['Memo'], rows: [['check later']] });
    });

    it('should keep date-formatted cells as dates after a file round trip', async () => {
      const sheet: XLSX.WorkSheet = {
        '!ref': 'A1:B2',
        A1: { t: 's', v: 'Title' },
        B1: { t: 's', v: 'Reported' },
        A2: { t: 's', v: 'Crash' },
        B2: { t: 'n', v: 45296, z: 'm/d/yy' },
      };
      mockReadFile.mockResolvedValue(workbookBuffer({ Sheet1: sheet }));

      const workbook = await openWorkbook('/data/book.xlsx');

      expect(workbook.readSheet('Sheet1').rows).toEqual([['Crash', new Date(2024, 0, 5)]]);
    });

    it('should wrap file read errors in ParseFailureError', async () => {
      mockReadFile.mockRejectedValue(new Error('File not found'));

      await expect(openWorkbook('/data/missing.xlsx')).rejects.toThrow(ParseFailureError);
      await expect(openWorkbook('/data/missing.xlsx')).rejects.toThrow(
        'Failed to read workbook /data/missing.xlsx: File not found'
      );
    });

    it('should wrap parse errors in ParseFailureError', async () => {
      mockReadFile.mockResolvedValue(Buffer.from('corrupt'));
      vi.mocked(XLSX.read).mockImplementationOnce(() => {
        throw new Error('Unsupported file');
      });

      const error = await openWorkbook('/data/corrupt.xlsx').then(() => null, (e: unknown) => e);

      expect(error).toBeInstanceOf(ParseFailureError);
      expect(error).toMatchObject({ filepath: '/data/corrupt.xlsx' });
      const cause = error instanceof ParseFailureError ? error.cause : undefined;
      expect(cause).toBeInstanceOf(Error);
      expect(String(cause)).toBe('Error: Unsupported file');
    });

    it('should reject unknown sheet names', async () => {
      mockReadFile.mockResolvedValue(workbookBuffer({ Sheet1: XLSX.utils.aoa_to_sheet([['A']]) }));

      const workbook = await openWorkbook('/data/book.xlsx');

      expect(() => workbook.readSheet('Missing')).toThrow(/Sheet not found: Missing/);
    });
  });

  describe('isSupportedSpreadsheet', () => {
    it('should accept the default spreadsheet extensions in any case', () => {
      expect(isSupportedSpreadsheet('a.xlsx')).toBe(true);
      expect(isSupportedSpreadsheet('a.XLSM')).toBe(true);
      expect(isSupportedSpreadsheet('a.xls')).toBe(true);
    });

    it('should reject other files', () => {
      expect(isSupportedSpreadsheet('a.csv')).toBe(false);
      expect(isSupportedSpreadsheet('xlsx')).toBe(false);
      expect(isSupportedSpreadsheet('~$lock.txt')).toBe(false);
    });

    it('should honor a custom extension list', () => {
      expect(isSupportedSpreadsheet('a.ods', ['.ods'])).toBe(true);
      expect(isSupportedSpreadsheet('a.xlsx', ['.ods'])).toBe(false);
    });
  });
});
