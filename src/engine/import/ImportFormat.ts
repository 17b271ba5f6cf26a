import { existsSync, statSync } from 'node:fs';
import { BulkImportError } from './BulkImportError';

export type ImportFormat = 'csv' | 'json';

const SUFFIXES: Record<ImportFormat, string> = {
  csv: '.csv',
  json: '.json',
};

/**
 * Resolve the import format from the file suffix (case-sensitive, as the
 * file picker filters on `*.csv` / `*.json`). Returns null for anything else.
 */
export function resolveImportFormat(filePath: string): ImportFormat | null {
  if (filePath.endsWith(SUFFIXES.csv)) return 'csv';
  if (filePath.endsWith(SUFFIXES.json)) return 'json';
  return null;
}

/**
 * Caller-side check run before the model is touched: the file must exist and
 * carry a supported suffix.
 *
 * @throws {BulkImportError}
 */
export function validateImportPath(filePath: string): ImportFormat {
  if (filePath.trim().length === 0) {
    throw new BulkImportError('Please select a file first', filePath);
  }
  if (!existsSync(filePath) || !statSync(filePath).isFile()) {
    throw new BulkImportError(`File not found: ${filePath}`, filePath);
  }
  const format = resolveImportFormat(filePath);
  if (format === null) {
    throw new BulkImportError('Invalid file type. Please use .csv or .json', filePath);
  }
  return format;
}
