import Encoding from 'encoding-japanese';
import { ValidationError } from '../errors.js';
import { parseAmount } from '../domain/money.js';
import { normalizeCategory, parseDate, parseKind } from '../store/recordStore.js';
import type { Transaction } from '../domain/types.js';

/** Columns written by the CSV export, in order */
export const CSV_COLUMNS = ['id', 'date', 'type', 'amount', 'category', 'note', 'created_at'] as const;

const REQUIRED_COLUMNS = ['id', 'date', 'type', 'amount'] as const;

export interface CsvRowError {
  line: number;       // 1-based line where the row starts
  message: string;
}

export interface CsvParseResult {
  records: Transaction[];
  errors: CsvRowError[];
  error?: string;
}

interface CsvRow {
  line: number;
  cells: string[];
}

/**
 * Decode file bytes to string, trying UTF-8 first, then Shift_JIS/CP932
 */
export function decodeFileContent(buffer: Uint8Array): string {
  // Try UTF-8 first
  try {
    const decoder = new TextDecoder('utf-8', { fatal: true });
    const text = decoder.decode(buffer);
    if (!text.includes('\uFFFD')) {
      return text;
    }
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    // Not UTF-8; fall through to Shift_JIS
  }

  const detected = Encoding.detect(buffer);
  const unicodeArray = Encoding.convert(buffer, {
    to: 'UNICODE',
    from: detected === 'UTF8' ? 'UTF8' : 'SJIS',
  });
  return Encoding.codeToString(unicodeArray);
}

/**
 * Split CSV text into rows. Quoted fields may contain commas, doubled quotes
 * and line breaks and are kept verbatim; unquoted fields are trimmed.
 */
function parseCsvRows(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;
  let quoted = false;
  let line = 1;
  let rowStart = 1;

  const endCell = () => {
    row.push(quoted ? current : current.trim());
    current = '';
    quoted = false;
  };

  const endRow = () => {
    endCell();
    if (row.length > 1 || row[0] !== '') {
      rows.push({ line: rowStart, cells: row });
    }
    row = [];
  };

  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (char === '"') {
      if (inQuotes && input[i + 1] === '"') {
        current += '"';
        i++;
      } else if (inQuotes) {
        inQuotes = false;
      } else {
        // Padding before the opening quote is not part of the value
        if (!quoted) current = '';
        inQuotes = true;
        quoted = true;
      }
    } else if (char === ',' && !inQuotes) {
      endCell();
    } else if ((char === '\n' || char === '\r') && !inQuotes) {
      if (char === '\r' && input[i + 1] === '\n') i++;
      endRow();
      line++;
      rowStart = line;
    } else if (quoted && !inQuotes) {
      // Text after the closing quote: keep anything but padding
      if (char.trim() !== '') current += char;
    } else {
      if (char === '\n') line++;
      current += char;
    }
  }
  if (current !== '' || quoted || row.length > 0) {
    endRow();
  }

  return rows;
}

/** Blank falls back to the id as a millisecond timestamp */
function parseCreatedAt(raw: string, id: number): string {
  if (raw === '') return new Date(id).toISOString();
  if (Number.isNaN(Date.parse(raw))) {
    throw new Error(`invalid created_at '${raw}'`);
  }
  return raw;
}

function parseRecord(cells: string[], index: Map<string, number>): Transaction {
  const cell = (name: string) => {
    const at = index.get(name);
    return at === undefined ? '' : (cells[at] ?? '');
  };

  const rawId = cell('id');
  if (!/^\d+$/.test(rawId) || !Number.isSafeInteger(Number(rawId))) {
    throw new Error(`invalid id '${rawId}'`);
  }
  const id = Number(rawId);

  const rawDate = cell('date');
  if (rawDate === '') {
    throw new Error('missing date');
  }
  const date = parseDate(rawDate, new Date(id));

  return {
    id,
    date,
    kind: parseKind(cell('type')),
    amount: parseAmount(cell('amount')),
    category: normalizeCategory(cell('category')),
    note: cell('note'),
    createdAt: parseCreatedAt(cell('created_at'), id),
  };
}

/**
 * Parse a CSV in the export layout back into records.
 * Bad rows are reported by line and left out; the rest still import.
 */
export function parseTransactionsCsv(text: string): CsvParseResult {
  const rows = parseCsvRows(text);

  if (rows.length === 0) {
    return { records: [], errors: [], error: 'CSV is empty' };
  }

  const header = rows[0].cells.map((col) => col.toLowerCase().trim());
  const missing = REQUIRED_COLUMNS.filter((col) => !header.includes(col));
  if (missing.length > 0) {
    return {
      records: [],
      errors: [],
      error: `Unrecognized CSV format. Missing column(s): ${missing.join(', ')}. Expected header ${CSV_COLUMNS.join(',')}`,
    };
  }

  const index = new Map(header.map((name, i) => [name, i]));
  const records: Transaction[] = [];
  const errors: CsvRowError[] = [];

  for (const row of rows.slice(1)) {
    try {
      records.push(parseRecord(row.cells, index));
    } catch (error) {
      if (!(error instanceof Error)) throw error;
      const message = error instanceof ValidationError ? error.message : `Row rejected: ${error.message}`;
      errors.push({ line: row.line, message });
    }
  }

  return { records, errors };
}
