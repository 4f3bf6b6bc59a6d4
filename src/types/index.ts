/**
 * Core type definitions for sheetdocs
 */

// Tabular types
export type CellValue = string | number | boolean | Date | null;

export interface TabularGrid {
  columns: string[];
  rows: CellValue[][];
}

// Workbook types
export interface Workbook {
  fileName: string;
  sheetNames: string[];
  readSheet(sheetName: string): TabularGrid;
}

// Classification types
export type DocType = 'test_viewpoints' | 'design_spec' | 'unknown';

export interface DocTypeRule {
  docType: Exclude<DocType, 'unknown'>;
  keywords: string[];
}

// Document types
export interface DocumentMetadata {
  source_file: string;
  sheet: string;
  doc_type: DocType;
  generated_at: string;
}

// Pipeline types
export type ProgressStatus = 'success' | 'failed';

export interface PipelineOptions {
  inputDir: string;
  outputDir: string;
  maxCharsPerChunk: number;
  supportedExtensions: string[];
  docTypeRules: DocTypeRule[];
  continueOnError: boolean;
  now?: () => Date;
  onProgress?: (current: number, total: number, filename: string, status: ProgressStatus) => void;
}

export interface SheetResult {
  sheet: string;
  docType: DocType;
  chunkCount: number;
  outputs: string[];
}

export interface WorkbookResult {
  file: string;
  sheets: SheetResult[];
  chunkCount: number;
  outputs: string[];
}

export interface PipelineError {
  file: string;
  error: string;
}

export interface PipelineSummary {
  processed: number;
  failed: number;
  sheets: number;
  chunks: number;
  outputs: string[];
  errors: PipelineError[];
}

// Config types
export interface Config {
  chunking: {
    maxChars: number;
  };
  input: {
    supportedExtensions: string[];
  };
  classification: {
    rulesPath: string;
  };
  pipeline: {
    continueOnError: boolean;
  };
}
