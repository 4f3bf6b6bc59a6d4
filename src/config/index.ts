/**
 * Configuration management for sheetdocs
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname, isAbsolute } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../utils/errors.js';
import type { Config } from '../types/index.js';

// Project root is two levels up from both src/config and dist/config
const __dirname = dirname(fileURLToPath(import.meta.url));
export const PROJECT_ROOT = resolve(__dirname, '../..');

dotenvConfig({ path: resolve(PROJECT_ROOT, '.env') });

export const DEFAULT_MAX_CHARS_PER_CHUNK = 8000;
export const DEFAULT_SUPPORTED_EXTENSIONS = ['.xlsx', '.xlsm', '.xls'];
export const DEFAULT_RULES_PATH = resolve(PROJECT_ROOT, 'config/doc-type-rules.json');

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function getEnvNumber(key: string, defaultValue: number, min?: number, max?: number): number {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`Invalid number for environment variable ${key}: ${value}`);
  }
  if (min !== undefined && parsed < min) {
    throw new ConfigurationError(`Environment variable ${key} must be at least ${min}, got ${parsed}`);
  }
  if (max !== undefined && parsed > max) {
    throw new ConfigurationError(`Environment variable ${key} must be at most ${max}, got ${parsed}`);
  }
  return parsed;
}

export function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Comma-separated extension list, normalized to lowercase with a leading dot
 */
export function getEnvExtensions(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const extensions = value
    .split(',')
    .map(ext => ext.trim().toLowerCase())
    .filter(ext => ext.length > 0)
    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`));
  if (extensions.length === 0) {
    throw new ConfigurationError(`Environment variable ${key} must list at least one extension`);
  }
  return extensions;
}

function resolveFromRoot(filepath: string): string {
  return isAbsolute(filepath) ? filepath : resolve(PROJECT_ROOT, filepath);
}

export const config: Config = {
  chunking: {
    maxChars: getEnvNumber('MAX_CHARS_PER_CHUNK', DEFAULT_MAX_CHARS_PER_CHUNK, 100, 1000000),
  },
  input: {
    supportedExtensions: getEnvExtensions('SUPPORTED_EXTENSIONS', DEFAULT_SUPPORTED_EXTENSIONS),
  },
  classification: {
    rulesPath: resolveFromRoot(getEnv('DOC_TYPE_RULES_PATH', DEFAULT_RULES_PATH)),
  },
  pipeline: {
    continueOnError: getEnvBoolean('CONTINUE_ON_ERROR', true),
  },
};

export default config;
