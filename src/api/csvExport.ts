import { writeFileAtomic, type FileSystem } from '../store/jsonFile.js';
import { formatAmount } from '../domain/money.js';
import { compareCreated } from '../domain/computations.js';
import { CSV_COLUMNS } from './csvParser.js';
import type { Snapshot } from '../domain/types.js';

function escapeCell(value: string): string {
  if (/[",\r\n]/.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render the snapshot as CSV, oldest first (date, then creation time).
 */
export function toCsv(txns: Snapshot): string {
  const ordered = [...txns].sort((a, b) => {
    if (a.date !== b.date) return a.date < b.date ? -1 : 1;
    return compareCreated(a, b);
  });

  const lines = [CSV_COLUMNS.join(',')];
  for (const t of ordered) {
    lines.push(
      [String(t.id), t.date, t.kind, formatAmount(t.amount), t.category, t.note, t.createdAt]
        .map(escapeCell)
        .join(','),
    );
  }
  return `${lines.join('\r\n')}\r\n`;
}

/**
 * Write the CSV to `filePath`. Throws IoFailureError when the destination
 * cannot be written. Returns the number of rows exported.
 */
export function exportCsv(txns: Snapshot, filePath: string, fsImpl?: FileSystem): number {
  writeFileAtomic(filePath, toCsv(txns), fsImpl);
  return txns.length;
}
