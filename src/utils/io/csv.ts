import { parse as parseSync } from 'csv-parse/sync';
import * as csv from 'fast-csv';
import { appendText, checkExists, loadText, saveText } from './io';

export type CsvRecord = Record<string, string | undefined>;

/**
 * Creates a CSV file holding only its header row if it does not exist yet
 */
export function ensureCsvExists(fn: string, headers: readonly string[]) {
  if (!checkExists(fn)) {
    appendText(headers.join(',') + '\n', fn);
  }
}

/**
 * Reads a CSV file as records keyed by the header row
 */
export function readCsv(fn: string, headers: readonly string[]): CsvRecord[] {
  ensureCsvExists(fn, headers);
  const records: CsvRecord[] = parseSync(loadText(fn), {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  });
  return records;
}

/**
 * Formats rows as CSV text, one line per row, each ending in a newline
 */
export function formatCsv(rows: string[][]): Promise<string> {
  return csv.writeToString(rows, { includeEndRowDelimiter: true });
}

/**
 * Rewrites the whole file: header followed by every row
 */
export async function writeCsv(fn: string, headers: readonly string[], rows: string[][]) {
  const content = await formatCsv([[...headers], ...rows]);
  saveText(content, fn);
}

/**
 * Appends rows to the file, creating it with its header first if needed
 */
export async function appendCsv(fn: string, headers: readonly string[], rows: string[][]) {
  ensureCsvExists(fn, headers);
  const existing = loadText(fn);
  const content = await formatCsv(rows);
  // A hand-edited file may lack its final newline
  const separator = existing.length > 0 && !existing.endsWith('\n') ? '\n' : '';
  appendText(separator + content, fn);
}
