/**
 * Conversion pipeline - discovers workbooks and drives
 * classification, normalization, rendering, chunking and emission per sheet
 */

import { mkdir, readdir, stat } from 'fs/promises';
import { basename, join } from 'path';
import { config } from '../../config/index.js';
import { classifyDocType, loadDocTypeRules } from '../classification/service.js';
import { openWorkbook, isSupportedSpreadsheet } from '../ingestion/parsers/index.js';
import { normalizeGrid } from '../normalization/service.js';
import { documentTitle, renderDocument } from '../rendering/service.js';
import { ChunkingService } from '../chunking/service.js';
import { documentBaseName, emitChunks } from '../emission/service.js';
import { ParseFailureError, WriteFailureError, errorMessage } from '../../utils/errors.js';
import type {
  DocumentMetadata,
  PipelineError,
  PipelineOptions,
  PipelineSummary,
  SheetResult,
  WorkbookResult,
} from '../../types/index.js';

/**
 * Build pipeline options from the configuration layer, with per-call overrides
 */
export function createPipelineOptions(
  inputDir: string,
  outputDir: string,
  overrides: Partial<Omit<PipelineOptions, 'inputDir' | 'outputDir'>> = {}
): PipelineOptions {
  return {
    inputDir,
    outputDir,
    maxCharsPerChunk: overrides.maxCharsPerChunk ?? config.chunking.maxChars,
    supportedExtensions: overrides.supportedExtensions ?? config.input.supportedExtensions,
    docTypeRules: overrides.docTypeRules ?? loadDocTypeRules(config.classification.rulesPath),
    continueOnError: overrides.continueOnError ?? config.pipeline.continueOnError,
    now: overrides.now,
    onProgress: overrides.onProgress,
  };
}

/**
 * Whether a symlink resolves to a regular file; dangling links do not
 */
async function isLinkedFile(linkPath: string): Promise<boolean> {
  try {
    return (await stat(linkPath)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Recursively collect spreadsheet files under a directory, in sorted order.
 * Symlinks to files are followed; symlinked directories are not descended.
 */
export async function discoverSpreadsheets(dirPath: string, extensions: readonly string[]): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dirPath, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await discoverSpreadsheets(fullPath, extensions)));
    } else if (!isSupportedSpreadsheet(fullPath, extensions)) {
      continue;
    } else if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkedFile(fullPath)))) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Convert every sheet of one workbook into chunk files
 */
export async function processWorkbook(
  filepath: string,
  options: Pick<PipelineOptions, 'outputDir' | 'maxCharsPerChunk' | 'docTypeRules' | 'now'>
): Promise<WorkbookResult> {
  const now = options.now ?? (() => new Date());
  const chunker = new ChunkingService(options.maxCharsPerChunk);
  const workbook = await openWorkbook(filepath);
  const docType = classifyDocType(workbook.fileName, options.docTypeRules);

  // Render every sheet before writing, so an unreadable sheet leaves no partial output
  const rendered = workbook.sheetNames.map(sheet => {
    const grid = normalizeGrid(workbook.readSheet(sheet));
    const meta: DocumentMetadata = {
      source_file: workbook.fileName,
      sheet,
      doc_type: docType,
      generated_at: now().toISOString(),
    };
    const document = renderDocument(documentTitle(workbook.fileName, sheet), grid, meta);
    return { sheet, chunks: chunker.chunk(document) };
  });

  const sheets: SheetResult[] = [];
  for (const { sheet, chunks } of rendered) {
    const outputs = await emitChunks(options.outputDir, documentBaseName(workbook.fileName, sheet), chunks);
    sheets.push({ sheet, docType, chunkCount: chunks.length, outputs });
  }

  return {
    file: filepath,
    sheets,
    chunkCount: sheets.reduce((sum, s) => sum + s.chunkCount, 0),
    outputs: sheets.flatMap(s => s.outputs),
  };
}

/**
 * Run the whole batch. Unreadable workbooks are skipped and reported unless
 * continueOnError is off; write failures always abort.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineSummary> {
  const { onProgress } = options;

  try {
    await mkdir(options.outputDir, { recursive: true });
  } catch (error) {
    throw new WriteFailureError(options.outputDir, error);
  }

  const files = await discoverSpreadsheets(options.inputDir, options.supportedExtensions);

  let processed = 0;
  let failed = 0;
  let sheets = 0;
  let chunks = 0;
  const outputs: string[] = [];
  const errors: PipelineError[] = [];

  for (const [index, filepath] of files.entries()) {
    const filename = basename(filepath);
    try {
      const result = await processWorkbook(filepath, options);
      processed++;
      sheets += result.sheets.length;
      chunks += result.chunkCount;
      outputs.push(...result.outputs);
      onProgress?.(index + 1, files.length, filename, 'success');
    } catch (error) {
      if (!(error instanceof ParseFailureError) || !options.continueOnError) {
        throw error;
      }
      failed++;
      errors.push({ file: filepath, error: errorMessage(error) });
      onProgress?.(index + 1, files.length, filename, 'failed');
    }
  }

  return { processed, failed, sheets, chunks, outputs, errors };
}
