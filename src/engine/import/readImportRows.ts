import { existsSync, readFileSync } from 'node:fs';
import { describeError } from '../../lib/errors';
import { BulkImportError } from './BulkImportError';
import { parseCsvRows } from './CsvReader';
import { iterateJsonRows, parseJsonEntries } from './JsonReader';
import type { ImportFormat } from './ImportFormat';

/** One imported data point, keyed by column / property name. */
export type ImportRow = Readonly<Record<string, unknown>>;

function readSource(filePath: string): string {
  if (!existsSync(filePath)) {
    throw new BulkImportError(`File not found: ${filePath}`, filePath);
  }
  try {
    return readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new BulkImportError(`Could not read ${filePath}: ${describeError(err)}`, filePath);
  }
}

/**
 * Open an import file and return its rows in file order, whatever the format.
 * The whole file is read and parsed before the first row is returned.
 *
 * @throws {BulkImportError}
 */
export function readImportRows(filePath: string, format: ImportFormat): Iterable<ImportRow> {
  const content = readSource(filePath);
  switch (format) {
    case 'csv':
      return parseCsvRows(content, filePath);
    case 'json':
      return iterateJsonRows(parseJsonEntries(content, filePath), filePath);
  }
}
