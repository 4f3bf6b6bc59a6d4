/**
 * Document type inference from file names
 *
 * The keyword table is data, not code: rules are evaluated in order and the
 * first rule with a keyword contained in the file stem wins.
 */

import { readFileSync } from 'fs';
import { basename, extname } from 'path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../../utils/errors.js';
import type { DocType, DocTypeRule } from '../../types/index.js';

const docTypeRulesSchema = z.object({
  rules: z.array(
    z.object({
      docType: z.enum(['test_viewpoints', 'design_spec']),
      keywords: z.array(z.string().min(1)).min(1),
    })
  ),
});

/**
 * Built-in rules, used when no rules file is configured
 */
export const DEFAULT_DOC_TYPE_RULES: DocTypeRule[] = [
  { docType: 'test_viewpoints', keywords: ['観点', 'view', 'test'] },
  { docType: 'design_spec', keywords: ['設計', '仕様', 'design'] },
];

/**
 * Load and validate a rules file
 */
export function loadDocTypeRules(filepath: string): DocTypeRule[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filepath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read doc type rules from ${filepath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  const parsed = docTypeRulesSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.errors
      .map(e => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid doc type rules in ${filepath}: ${details}`);
  }
  return parsed.data.rules;
}

/**
 * Infer the document category of a spreadsheet from its file name
 */
export function classifyDocType(
  fileName: string,
  rules: readonly DocTypeRule[] = DEFAULT_DOC_TYPE_RULES
): DocType {
  const name = basename(fileName);
  const stem = name.slice(0, name.length - extname(name).length).toLowerCase();

  for (const rule of rules) {
    if (rule.keywords.some(keyword => stem.includes(keyword.toLowerCase()))) {
      return rule.docType;
    }
  }
  return 'unknown';
}
