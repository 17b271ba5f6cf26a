import { z } from 'zod';
import { describeError } from '../../lib/errors';
import { BulkImportError } from './BulkImportError';
import type { ImportRow } from './readImportRows';

const JsonEntriesSchema = z.array(z.unknown());
const JsonEntrySchema = z.record(z.string(), z.unknown());

/**
 * Parse JSON text as an array of entries.
 * Entries are not inspected here; see `iterateJsonRows`.
 *
 * @throws {BulkImportError} on malformed JSON or a non-array top level.
 */
export function parseJsonEntries(content: string, filePath: string): unknown[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new BulkImportError(`Malformed JSON: ${describeError(err)}`, filePath);
  }

  const parsed = JsonEntriesSchema.safeParse(data);
  if (!parsed.success) {
    throw new BulkImportError('Expected a JSON array of objects', filePath);
  }
  return parsed.data;
}

/**
 * Yield each entry as a row. An entry that is not a plain object stops the
 * iteration with an error at that position; rows already yielded stay applied.
 */
export function* iterateJsonRows(entries: readonly unknown[], filePath: string): Generator<ImportRow> {
  for (let i = 0; i < entries.length; i++) {
    const entry = JsonEntrySchema.safeParse(entries[i]);
    if (!entry.success) {
      throw new BulkImportError(`Row ${i + 1} is not an object`, filePath, i + 1);
    }
    yield entry.data;
  }
}
