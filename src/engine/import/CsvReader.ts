import { BulkImportError } from './BulkImportError';
import type { ImportRow } from './readImportRows';

/**
 * Split CSV text into records of trimmed cells.
 *
 * Double quotes group a cell, which may then hold commas and line breaks; a
 * doubled quote inside a group is a literal quote. A record ends at a line
 * break outside quotes. Blank lines yield no record.
 *
 * @throws {BulkImportError} when a quoted cell is never closed.
 */
export function splitCsvRecords(content: string, filePath: string): string[][] {
  const records: string[][] = [];
  let cells: string[] = [];
  let current = '';
  let inQuotes = false;
  let quoted = false;

  const endCell = () => {
    cells.push(current.trim());
    current = '';
  };
  const endRecord = () => {
    endCell();
    const blank = !quoted && cells.length === 1 && cells[0] === '';
    if (!blank) records.push(cells);
    cells = [];
    quoted = false;
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    if (inQuotes) {
      if (char !== '"') {
        current += char;
      } else if (content[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = false;
      }
    } else if (char === '"') {
      inQuotes = true;
      quoted = true;
    } else if (char === ',') {
      endCell();
    } else if (char === '\n') {
      endRecord();
    } else if (char !== '\r' || content[i + 1] !== '\n') {
      current += char;
    }
  }

  if (inQuotes) {
    const row = records.length;
    throw new BulkImportError(`Unterminated quoted field in row ${row}`, filePath, row);
  }
  if (current.length > 0 || cells.length > 0 || quoted) {
    endRecord();
  }

  return records;
}

/**
 * Parse CSV text into one record per data row, keyed by header name.
 *
 * Short rows leave their trailing columns absent; rows with more cells than
 * the header are rejected. When a header name repeats, the first column with
 * that name wins.
 *
 * @throws {BulkImportError} when there is no header, a quote is left open or a row is too wide.
 */
export function parseCsvRows(content: string, filePath: string): ImportRow[] {
  const records = splitCsvRecords(content.replace(/^\uFEFF/, ''), filePath);

  if (records.length === 0) {
    throw new BulkImportError('No columns to parse from file', filePath);
  }

  const header = records[0];
  const rows: ImportRow[] = [];

  for (let i = 1; i < records.length; i++) {
    const cells = records[i];
    if (cells.length > header.length) {
      throw new BulkImportError(
        `Expected ${header.length} fields in row ${i}, saw ${cells.length}`,
        filePath,
        i,
      );
    }

    const record: Record<string, unknown> = {};
    header.forEach((name, col) => {
      if (col < cells.length && !Object.prototype.hasOwnProperty.call(record, name)) {
        record[name] = cells[col];
      }
    });
    rows.push(record);
  }

  return rows;
}
