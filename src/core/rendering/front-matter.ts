/**
 * YAML front matter for rendered documents
 */

import type { DocumentMetadata } from '../../types/index.js';

/**
 * Key order is fixed; consumers may read the header positionally
 */
export const METADATA_KEYS = ['source_file', 'sheet', 'doc_type', 'generated_at'] as const;

export const FRONT_MATTER_DELIMITER = '---';

const RESERVED_WORDS = new Set([
  'true', 'false', 'yes', 'no', 'on', 'off', 'y', 'n', 'null', '~',
  '.inf', '-.inf', '+.inf', '.nan',
]);

// Scalars YAML would resolve to numbers, dates or timestamps
const NUMBER_LIKE = /^[-+]?(\d[\d_]*(\.\d*)?|\.\d+)([eE][-+]?\d+)?$|^0x[0-9a-fA-F]+$|^0o[0-7]+$|^0b[01_]+$/;
// YAML 1.1 base-60 integers and floats, e.g. 1:30
const SEXAGESIMAL = /^[-+]?\d+(:[0-5]?\d)+(\.\d*)?$/;
const DATE_LIKE = /^\d{4}-\d{1,2}-\d{1,2}([Tt ].*)?$/;
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

function needsQuotes(value: string): boolean {
  if (value === '') return true;
  if (value !== value.trim()) return true;
  if (RESERVED_WORDS.has(value.toLowerCase())) return true;
  if (NUMBER_LIKE.test(value) || SEXAGESIMAL.test(value) || DATE_LIKE.test(value)) return true;
  if (/^[-?:,[\]{}#&*!|>'"%@`]/.test(value)) return true;
  if (/: |:$| #/.test(value)) return true;
  return CONTROL_CHARS.test(value);
}

/**
 * Serialize a string as a YAML scalar, quoting only when required
 */
export function yamlScalar(value: string): string {
  if (!needsQuotes(value)) return value;
  // Double-quoted scalars take JSON escapes
  if (CONTROL_CHARS.test(value)) {
    return JSON.stringify(value);
  }
  return `'${value.replace(/'/g, "''")}'`;
}

export function renderFrontMatter(meta: DocumentMetadata): string {
  const lines = METADATA_KEYS.map(key => `${key}: ${yamlScalar(meta[key])}`);
  return `${FRONT_MATTER_DELIMITER}\n${lines.join('\n')}\n${FRONT_MATTER_DELIMITER}\n`;
}
