// ═══════════════════════════════════════════════════════════
// CSV Export Utility
// Serialize rows for the history file and CSV downloads
// ═══════════════════════════════════════════════════════════

import { Response } from 'express';

export interface CSVColumn<T> {
  header: string;
  accessor: (row: T) => string | number;
}

/**
 * Quote a value if it contains a comma, quote, or line break
 */
export function formatCsvValue(value: string | number | null | undefined): string {
  const stringValue = String(value ?? '');
  if (/[",\r\n]/.test(stringValue)) {
    return `"${stringValue.replace(/"/g, '""')}"`;
  }
  return stringValue;
}

export function formatCsvRow(values: readonly (string | number | null | undefined)[]): string {
  return values.map(formatCsvValue).join(',');
}

/**
 * Build a complete CSV document (header + one line per row, trailing newline)
 */
export function buildCsv<T>(rows: Iterable<T>, columns: readonly CSVColumn<T>[]): string {
  const lines = [formatCsvRow(columns.map(c => c.header))];

  for (const row of rows) {
    lines.push(formatCsvRow(columns.map(col => col.accessor(row))));
  }

  return lines.join('\n') + '\n';
}

/**
 * Send rows as a CSV attachment
 */
export function sendCsv<T>(
  res: Response,
  filename: string,
  rows: Iterable<T>,
  columns: readonly CSVColumn<T>[]
): void {
  res.setHeader('Content-Type', 'text/csv; charset=utf-8');
  res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
  res.send(buildCsv(rows, columns));
}
