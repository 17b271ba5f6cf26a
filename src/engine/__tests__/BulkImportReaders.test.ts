// Uses node:fs to create real files in a throwaway temp directory.
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseCsvRows, splitCsvRecords } from '../import/CsvReader';
import { iterateJsonRows, parseJsonEntries } from '../import/JsonReader';
import { resolveImportFormat, validateImportPath } from '../import/ImportFormat';
import { readImportRows } from '../import/readImportRows';
import { BulkImportError } from '../import/BulkImportError';

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'import-readers-'));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

// ─── CSV ──────────────────────────────────────────────────────────────────────

describe('splitCsvRecords', () => {
  it('splits on commas and trims cells', () => {
    expect(splitCsvRecords(' 80 , 70,60', 'a.csv')).toEqual([['80', '70', '60']]);
  });

  it('keeps quoted commas and unescapes doubled quotes', () => {
    expect(splitCsvRecords('a, "b,c" ,"say ""hi"""', 'a.csv')).toEqual([['a', 'b,c', 'say "hi"']]);
  });

  it('keeps empty cells', () => {
    expect(splitCsvRecords('1,,3,', 'a.csv')).toEqual([['1', '', '3', '']]);
  });

  it('keeps a line break inside a quoted cell in the same record', () => {
    expect(splitCsvRecords('80,"line one\nline two"\r\n60,ok\n', 'a.csv')).toEqual([
      ['80', 'line one\nline two'],
      ['60', 'ok'],
    ]);
  });

  it('keeps a quoted empty line as a record', () => {
    expect(splitCsvRecords('a\n""\n', 'a.csv')).toEqual([['a'], ['']]);
  });

  it('rejects a quote that is never closed, naming the row', () => {
    try {
      splitCsvRecords('preparedness,notes\n80,"open\n60,ok\n', 'open.csv');
      expect.unreachable('expected splitCsvRecords to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(BulkImportError);
      if (err instanceof BulkImportError) {
        expect(err.message).toBe('Unterminated quoted field in row 1');
        expect(err.row).toBe(1);
        expect(err.filePath).toBe('open.csv');
      }
    }
  });
});

describe('parseCsvRows', () => {
  it('keys each row by header and skips blank lines', () => {
    const rows = parseCsvRows('preparedness,teaching\r\n80,70\n\n90\n', 'rows.csv');
    expect(rows).toEqual([
      { preparedness: '80', teaching: '70' },
      { preparedness: '90' },
    ]);
  });

  it('strips a byte-order mark from the header', () => {
    expect(parseCsvRows('\uFEFFpreparedness\n60', 'bom.csv')).toEqual([{ preparedness: '60' }]);
  });

  it('lets the first of two same-named columns win', () => {
    expect(parseCsvRows('teaching,teaching\n10,20', 'dup.csv')).toEqual([{ teaching: '10' }]);
  });

  it('reads a multi-line quoted cell as part of one row', () => {
    expect(parseCsvRows('preparedness,notes\n80,"line one\nline two"\n60,ok\n', 'multi.csv')).toEqual([
      { preparedness: '80', notes: 'line one\nline two' },
      { preparedness: '60', notes: 'ok' },
    ]);
  });

  it('returns no rows for a header-only file', () => {
    expect(parseCsvRows('preparedness,teaching\n', 'empty.csv')).toEqual([]);
  });

  it('rejects a file with no header', () => {
    expect(() => parseCsvRows('\n  \n', 'blank.csv')).toThrow('No columns to parse from file');
  });

  it('rejects a row wider than the header, naming the row', () => {
    try {
      parseCsvRows('preparedness\n50\n1,2', 'wide.csv');
      expect.unreachable('expected parseCsvRows to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(BulkImportError);
      if (err instanceof BulkImportError) {
        expect(err.message).toBe('Expected 1 fields in row 2, saw 2');
        expect(err.row).toBe(2);
        expect(err.filePath).toBe('wide.csv');
      }
    }
  });
});

// ─── JSON ─────────────────────────────────────────────────────────────────────

describe('parseJsonEntries', () => {
  it('returns the entries of a top-level array', () => {
    expect(parseJsonEntries('[{"teaching": 40}, 3]', 'a.json')).toEqual([{ teaching: 40 }, 3]);
  });

  it('rejects a top-level object', () => {
    expect(() => parseJsonEntries('{"teaching": 40}', 'a.json')).toThrow('Expected a JSON array of objects');
  });

  it('rejects malformed JSON', () => {
    expect(() => parseJsonEntries('[{"teaching": }]', 'a.json')).toThrow(/^Malformed JSON: /);
  });
});

describe('iterateJsonRows', () => {
  it('yields object entries in order, then fails on the first non-object', () => {
    const rows = iterateJsonRows([{ teaching: 40 }, [1, 2], { teaching: 60 }], 'a.json');
    expect(rows.next().value).toEqual({ teaching: 40 });
    expect(() => rows.next()).toThrow('Row 2 is not an object');
  });

  it('rejects null entries', () => {
    expect(() => [...iterateJsonRows([null], 'a.json')]).toThrow('Row 1 is not an object');
  });
});

// ─── Format resolution ────────────────────────────────────────────────────────

describe('resolveImportFormat', () => {
  it('branches on the .csv / .json suffix only', () => {
    expect(resolveImportFormat('history.csv')).toBe('csv');
    expect(resolveImportFormat('/tmp/history.json')).toBe('json');
    expect(resolveImportFormat('history.txt')).toBeNull();
    expect(resolveImportFormat('history.CSV')).toBeNull();
    expect(resolveImportFormat('history.csv.bak')).toBeNull();
  });
});

describe('validateImportPath', () => {
  it('asks for a file when the path is empty', () => {
    expect(() => validateImportPath('  ')).toThrow('Please select a file first');
  });

  it('rejects a missing file, naming it', () => {
    const missing = join(dir, 'missing.csv');
    expect(() => validateImportPath(missing)).toThrow(`File not found: ${missing}`);
  });

  it('rejects a directory', () => {
    const folder = join(dir, 'folder.json');
    mkdirSync(folder);
    expect(() => validateImportPath(folder)).toThrow(`File not found: ${folder}`);
  });

  it('rejects an unsupported suffix', () => {
    const notes = join(dir, 'notes.txt');
    writeFileSync(notes, 'preparedness\n50\n');
    expect(() => validateImportPath(notes)).toThrow('Invalid file type. Please use .csv or .json');
  });

  it('returns the format of a valid file', () => {
    const csv = join(dir, 'ok.csv');
    writeFileSync(csv, 'preparedness\n50\n');
    expect(validateImportPath(csv)).toBe('csv');
  });
});

// ─── readImportRows ───────────────────────────────────────────────────────────

describe('readImportRows', () => {
  it('reads CSV and JSON files through the same row shape', () => {
    const csv = join(dir, 'same.csv');
    const json = join(dir, 'same.json');
    writeFileSync(csv, 'teaching,materials\n40,30\n');
    writeFileSync(json, JSON.stringify([{ teaching: '40', materials: '30' }]));
    expect([...readImportRows(csv, 'csv')]).toEqual([{ teaching: '40', materials: '30' }]);
    expect([...readImportRows(json, 'json')]).toEqual([{ teaching: '40', materials: '30' }]);
  });

  it('fails with the file name when the file is missing', () => {
    const missing = join(dir, 'gone.json');
    expect(() => readImportRows(missing, 'json')).toThrow(`File not found: ${missing}`);
  });
});
