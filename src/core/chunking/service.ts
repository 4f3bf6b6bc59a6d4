/**
 * Boundary-aware chunking of rendered documents
 *
 * Documents that fit under the ceiling are returned as-is. Larger ones are
 * cut between lines, preferring a cut right before a heading or table row.
 * The ceiling is soft: a chunk can overshoot by at most one line.
 */

import { config } from '../../config/index.js';

/**
 * Trimmed line prefixes that mark a preferred cut point
 */
export const BOUNDARY_PREFIXES = ['## ', '### ', '|'] as const;

export interface ChunkingOptions {
  maxChars?: number;
}

/**
 * Length in code points, so surrogate pairs count once
 */
export function charLength(text: string): number {
  return [...text].length;
}

/**
 * Split text into lines, each keeping its terminator
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g) ?? [];
}

export function isBoundaryLine(line: string): boolean {
  const trimmed = line.trim();
  return BOUNDARY_PREFIXES.some(prefix => trimmed.startsWith(prefix));
}

function assertMaxChars(maxChars: number): void {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new RangeError(`maxChars must be a positive integer, got ${maxChars}`);
  }
}

/**
 * Yield the chunks of a document in order.
 * Joining everything yielded gives back the input exactly.
 */
export function* iterateChunks(text: string, maxChars: number): Generator<string, void, undefined> {
  assertMaxChars(maxChars);

  if (charLength(text) <= maxChars) {
    yield text;
    return;
  }

  let buffer: string[] = [];
  let size = 0;

  for (const line of splitLines(text)) {
    const lineSize = charLength(line);

    // Cut before a boundary line that would not fit
    if (size > 0 && size + lineSize > maxChars && isBoundaryLine(line)) {
      yield buffer.join('');
      buffer = [];
      size = 0;
    }

    buffer.push(line);
    size += lineSize;

    // Full buffer is flushed wherever it stands
    if (size >= maxChars) {
      yield buffer.join('');
      buffer = [];
      size = 0;
    }
  }

  if (buffer.length > 0) {
    yield buffer.join('');
  }
}

export function chunkDocument(text: string, maxChars: number): string[] {
  return Array.from(iterateChunks(text, maxChars));
}

export class ChunkingService {
  private defaultMaxChars: number;

  constructor(maxChars: number = config.chunking.maxChars) {
    assertMaxChars(maxChars);
    this.defaultMaxChars = maxChars;
  }

  /**
   * Split a rendered document into bounded-size chunks
   */
  chunk(text: string, options: ChunkingOptions = {}): string[] {
    return chunkDocument(text, options.maxChars ?? this.defaultMaxChars);
  }
}
