/**
 * Output file naming and persistence
 */

import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { createHash } from 'crypto';
import { WriteFailureError } from '../../utils/errors.js';

export const HASH_LENGTH = 8;
export const OUTPUT_EXTENSION = '.md';

// Characters that cannot appear in a file name on common platforms
const UNSAFE_FILENAME_CHARS = /[/\\:*?"<>|\u0000-\u001f]/g;

export function contentHash(content: string): string {
  return createHash('md5').update(content, 'utf8').digest('hex').slice(0, HASH_LENGTH);
}

/**
 * Base identity of a sheet's document: "<file stem>__<sheet>"
 */
export function documentBaseName(sourceFile: string, sheet: string): string {
  const name = basename(sourceFile);
  const stem = name.slice(0, name.length - extname(name).length);
  return `${stem}__${sheet}`.replace(UNSAFE_FILENAME_CHARS, '_');
}

/**
 * "<base>[__partNN]__<hash>.md"; the part index only appears for multi-chunk documents
 */
export function buildOutputName(base: string, content: string, partIndex: number, totalParts: number): string {
  const part = totalParts > 1 ? `__part${String(partIndex).padStart(2, '0')}` : '';
  return `${base}${part}__${contentHash(content)}${OUTPUT_EXTENSION}`;
}

/**
 * Write a file by renaming a fully written temporary sibling into place
 */
async function writeAtomic(target: string, content: string): Promise<void> {
  const temp = `${target}.${process.pid}.tmp`;
  try {
    await writeFile(temp, content, 'utf-8');
    await rename(temp, target);
  } catch (error) {
    await rm(temp, { force: true });
    throw new WriteFailureError(target, error);
  }
}

/**
 * Write one file per chunk and return the written paths in chunk order
 */
export async function emitChunks(outputDir: string, base: string, chunks: readonly string[]): Promise<string[]> {
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new WriteFailureError(outputDir, error);
  }

  const written: string[] = [];
  for (const [index, chunk] of chunks.entries()) {
    const target = join(outputDir, buildOutputName(base, chunk, index + 1, chunks.length));
    await writeAtomic(target, chunk);
    written.push(target);
  }
  return written;
}
