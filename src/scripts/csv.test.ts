/**
 * CSV export and import.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import Encoding from 'encoding-japanese';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { exportCsv, toCsv } from '../api/csvExport.js';
import { decodeFileContent, parseTransactionsCsv } from '../api/csvParser.js';
import { IoFailureError } from '../errors.js';
import type { Transaction } from '../domain/types.js';

const rent: Transaction = {
  id: 2,
  date: '2025-01-10',
  kind: 'expense',
  amount: 30000,
  category: 'Rent',
  note: '',
  createdAt: '2025-01-10T09:00:00.000Z',
};

const salary: Transaction = {
  id: 1,
  date: '2025-01-05',
  kind: 'income',
  amount: 100000,
  category: 'Salary',
  note: 'Jan, "bonus"',
  createdAt: '2025-01-05T09:00:00.000Z',
};

const EXPECTED_CSV =
  'id,date,type,amount,category,note,created_at\r\n' +
  '1,2025-01-05,income,1000.00,Salary,"Jan, ""bonus""",2025-01-05T09:00:00.000Z\r\n' +
  '2,2025-01-10,expense,300.00,Rent,,2025-01-10T09:00:00.000Z\r\n';

describe('toCsv', () => {
  test('toCsv: header, ordering and quoting', () => {
    expect(toCsv([rent, salary])).toBe(EXPECTED_CSV);
  });

  test('toCsv: same date ordered by creation time', () => {
    const early = { ...rent, id: 9, createdAt: '2025-01-10T08:00:00.000Z' };
    const ids = toCsv([rent, early])
      .trimEnd()
      .split('\r\n')
      .slice(1)
      .map((row) => row.split(',')[0]);
    expect(ids).toEqual(['9', '2']);
  });

  test('toCsv: creation order uses instants, not stamp text', () => {
    const offset = { ...rent, id: 5, createdAt: '2025-01-10T17:00:00+09:00' };
    const ids = toCsv([rent, offset])
      .trimEnd()
      .split('\r\n')
      .slice(1)
      .map((row) => row.split(',')[0]);
    expect(ids).toEqual(['5', '2']);
  });

  test('toCsv: empty ledger is just the header', () => {
    expect(toCsv([])).toBe('id,date,type,amount,category,note,created_at\r\n');
  });
});

describe('parseTransactionsCsv', () => {
  test('parse: reads back what toCsv wrote', () => {
    const result = parseTransactionsCsv(EXPECTED_CSV);
    expect(result.error).toBeUndefined();
    expect(result.errors).toEqual([]);
    expect(result.records).toEqual([salary, rent]);
  });

  test('parse: BOM, CRLF and header case', () => {
    const result = parseTransactionsCsv('\uFEFFID,Date,Type,Amount\r\n7,2025-01-01,income,2.5\r\n');
    expect(result.records).toEqual([
      {
        id: 7,
        date: '2025-01-01',
        kind: 'income',
        amount: 250,
        category: 'Uncategorized',
        note: '',
        createdAt: '1970-01-01T00:00:00.007Z',
      },
    ]);
  });

  test('parse: bad rows are reported by line, good rows kept', () => {
    const text = [
      'id,date,type,amount',
      '1,2025-01-01,expense,5',
      'x,2025-01-01,expense,5',
      '3,2025-02-30,expense,5',
      '4,2025-01-01,gift,5',
      '5,2025-01-01,expense,-1',
      '6,,expense,1',
    ].join('\n');

    const result = parseTransactionsCsv(text);
    expect(result.records.map((r) => r.id)).toEqual([1]);
    expect(result.errors).toEqual([
      { line: 3, message: "Row rejected: invalid id 'x'" },
      { line: 4, message: "Invalid date '2025-02-30'. Use YYYY-MM-DD." },
      { line: 5, message: "Type must be 'income' or 'expense', got 'gift'" },
      { line: 6, message: 'Amount must not be negative' },
      { line: 7, message: 'Row rejected: missing date' },
    ]);
  });

  test('parse: quoted line breaks keep later line numbers right', () => {
    const text = 'id,date,type,amount,note\n1,2025-01-01,expense,5,"two\nlines"\nbad,2025-01-01,expense,5\n';
    const result = parseTransactionsCsv(text);
    expect(result.records[0]?.note).toBe('two\nlines');
    expect(result.errors).toEqual([{ line: 4, message: "Row rejected: invalid id 'bad'" }]);
  });

  test('parse: quoted padding survives, unquoted padding is trimmed', () => {
    const padded = { ...rent, note: '  two spaces  ' };
    expect(parseTransactionsCsv(toCsv([padded])).records[0]?.note).toBe('  two spaces  ');

    const text = 'id,date,type,amount,category,note\n1,2025-01-01,expense,5,  Food  , "x, y" \n';
    expect(parseTransactionsCsv(text).records[0]).toMatchObject({ category: 'Food', note: 'x, y' });
  });

  test('parse: unreadable created_at is rejected', () => {
    const text = 'id,date,type,amount,created_at\n1,2025-01-01,expense,5,soon\n';
    expect(parseTransactionsCsv(text)).toEqual({
      records: [],
      errors: [{ line: 2, message: "Row rejected: invalid created_at 'soon'" }],
    });
  });

  test('parse: missing required columns', () => {
    const result = parseTransactionsCsv('date,amount\n2025-01-01,5\n');
    expect(result.records).toEqual([]);
    expect(result.error).toBe(
      'Unrecognized CSV format. Missing column(s): id, type. Expected header id,date,type,amount,category,note,created_at',
    );
  });

  test('parse: empty input', () => {
    expect(parseTransactionsCsv('').error).toBe('CSV is empty');
    expect(parseTransactionsCsv('\uFEFF\r\n\r\n').error).toBe('CSV is empty');
  });
});

describe('decodeFileContent', () => {
  const text = 'id,date,type,amount,category\r\n1,2025-01-01,expense,5,食費\r\n';

  test('decode: UTF-8', () => {
    expect(decodeFileContent(Buffer.from(text, 'utf-8'))).toBe(text);
  });

  test('decode: Shift_JIS', () => {
    const sjis = Uint8Array.from(Encoding.convert(Encoding.stringToCode(text), 'SJIS', 'UNICODE'));
    expect(decodeFileContent(sjis)).toBe(text);
    expect(parseTransactionsCsv(decodeFileContent(sjis)).records[0]?.category).toBe('食費');
  });
});

describe('exportCsv', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-csv-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('exportCsv: writes the file and returns the row count', () => {
    const target = path.join(dir, 'export.csv');
    expect(exportCsv([rent, salary], target)).toBe(2);
    expect(fs.readFileSync(target, 'utf-8')).toBe(EXPECTED_CSV);
  });

  test('exportCsv: unwritable destination', () => {
    const blocker = path.join(dir, 'not-a-dir');
    fs.writeFileSync(blocker, '');
    expect(() => exportCsv([rent], path.join(blocker, 'export.csv'))).toThrow(IoFailureError);
  });
});
