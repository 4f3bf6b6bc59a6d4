/**
 * Parser routing - which files are picked up as spreadsheets
 */

import { extname } from 'path';
import { DEFAULT_SUPPORTED_EXTENSIONS } from '../../../config/index.js';
import { openWorkbook } from './xlsx.js';

/**
 * Check whether a path carries one of the supported spreadsheet extensions
 */
export function isSupportedSpreadsheet(
  filepath: string,
  extensions: readonly string[] = DEFAULT_SUPPORTED_EXTENSIONS
): boolean {
  const ext = extname(filepath).toLowerCase();
  return ext !== '' && extensions.some(supported => supported.toLowerCase() === ext);
}

export { openWorkbook, sheetToGrid, toCellValue, uniqueColumnNames } from './xlsx.js';
