import type { CellValue } from '../shared/types.js';

const NEEDS_QUOTING = /[",\r\n]/;

const formatField = (value: CellValue): string => {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

/**
 * Serializes a table as CSV (RFC 4180, CRLF line endings)
 *
 * The header is the union of all row columns in first-seen order; absent and
 * undefined cells are written empty.
 */
export function toCsv(rows: readonly Readonly<Record<string, CellValue>>[]): string {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const column of Object.keys(row)) {
      if (!seen.has(column)) {
        seen.add(column);
        columns.push(column);
      }
    }
  }

  const lines = [columns.map(formatField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => formatField(Object.hasOwn(row, column) ? row[column] : undefined)).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}
