/**
 * Document rendering - front matter, title and table body
 */

import { basename, extname } from 'path';
import { renderFrontMatter } from './front-matter.js';
import { renderMarkdownTable } from './markdown-table.js';
import type { DocumentMetadata, TabularGrid } from '../../types/index.js';

/**
 * Title shown as the document's H1: "<file stem> - <sheet>"
 */
export function documentTitle(sourceFile: string, sheet: string): string {
  const name = basename(sourceFile);
  return `${name.slice(0, name.length - extname(name).length)} - ${sheet}`;
}

export function isEmptyGrid(grid: TabularGrid): boolean {
  return grid.rows.length === 0 || grid.columns.length === 0;
}

/**
 * Render one sheet as a self-describing Markdown document.
 * An empty grid still yields the front matter and title.
 */
export function renderDocument(title: string, grid: TabularGrid, meta: DocumentMetadata): string {
  const parts = [renderFrontMatter(meta), '\n', `# ${title}\n\n`];
  if (!isEmptyGrid(grid)) {
    parts.push(renderMarkdownTable(grid), '\n');
  }
  return parts.join('');
}
