#!/usr/bin/env node
/**
 * sheetdocs - Main Entry Point
 *
 * Converts every spreadsheet under a directory into front-matter tagged
 * Markdown files, one or more per worksheet.
 *
 * Usage:
 *   sheetdocs --in-dir <dir> --out-dir <dir>
 *   sheetdocs <in-dir> <out-dir>
 */

import { realpathSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createPipelineOptions, runPipeline } from './core/pipeline/service.js';
import { errorMessage } from './utils/errors.js';

// Re-export the building blocks for programmatic use
export { classifyDocType, loadDocTypeRules, DEFAULT_DOC_TYPE_RULES } from './core/classification/service.js';
export { openWorkbook, isSupportedSpreadsheet } from './core/ingestion/parsers/index.js';
export { normalizeGrid } from './core/normalization/service.js';
export { renderDocument, documentTitle } from './core/rendering/service.js';
export { renderFrontMatter } from './core/rendering/front-matter.js';
export { renderMarkdownTable } from './core/rendering/markdown-table.js';
export { ChunkingService, chunkDocument, iterateChunks } from './core/chunking/service.js';
export { emitChunks, buildOutputName, documentBaseName } from './core/emission/service.js';
export {
  runPipeline,
  processWorkbook,
  discoverSpreadsheets,
  createPipelineOptions,
} from './core/pipeline/service.js';
export * from './utils/errors.js';
export * from './types/index.js';

const USAGE = 'Usage: sheetdocs --in-dir <input directory> --out-dir <output directory>';

const cliArgsSchema = z.object({
  inDir: z.string({ required_error: 'missing --in-dir' }).min(1, 'empty --in-dir'),
  outDir: z.string({ required_error: 'missing --out-dir' }).min(1, 'empty --out-dir'),
});

export type CliArgs = z.infer<typeof cliArgsSchema>;

/**
 * Parse `--in-dir`/`--out-dir` (either `--flag value` or `--flag=value`),
 * falling back to two positional paths
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const flags: Record<string, string | undefined> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const match = /^--(in-dir|out-dir)(?:=(.*))?$/.exec(arg);
    if (match) {
      flags[match[1]] = match[2] ?? argv[++i];
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const parsed = cliArgsSchema.safeParse({
    inDir: flags['in-dir'] ?? positional[0],
    outDir: flags['out-dir'] ?? positional[flags['in-dir'] === undefined ? 1 : 0],
  });
  if (!parsed.success) {
    throw new Error(parsed.error.errors.map(e => e.message).join(', '));
  }
  return parsed.data;
}

/**
 * CLI interface
 */
async function cli(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    process.exit(1);
  }

  const inputDir = resolve(args.inDir);
  const outputDir = resolve(args.outDir);

  const summary = await runPipeline(
    createPipelineOptions(inputDir, outputDir, {
      onProgress: (current, total, filename, status) => {
        const icon = status === 'success' ? '✓' : '✗';
        console.log(`[${current}/${total}] ${icon} ${filename}`);
      },
    })
  );

  console.log(`Processed ${summary.processed} Excel file(s) → ${outputDir}`);
  console.log(`  Sheets: ${summary.sheets}`);
  console.log(`  Files written: ${summary.outputs.length}`);

  if (summary.errors.length > 0) {
    console.error(`\nSkipped ${summary.failed} file(s):`);
    for (const err of summary.errors) {
      console.error(`  - ${err.file}: ${err.error}`);
    }
    process.exitCode = 1;
  }
}

// Run CLI if this is the main module (also when invoked through the bin symlink)
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  cli().catch((error: unknown) => {
    console.error('Error:', errorMessage(error));
    process.exit(1);
  });
}
