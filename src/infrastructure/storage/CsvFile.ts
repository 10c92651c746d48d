import { randomUUID } from 'crypto';
import { appendFile, mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { StorageError, isErrnoException } from '../errors/ComplaintDeskError.js';

export type CsvRow = readonly string[];

/**
 * Parse CSV text into rows of strings.
 * Blank lines are skipped and rows may differ in length.
 */
export function decodeCsv(text: string): string[][] {
  const parsed: unknown = parse(text, {
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true
  });

  if (!Array.isArray(parsed)) {
    return [];
  }

  const records: unknown[] = parsed;
  return records.map(record => (Array.isArray(record) ? record.map(value => String(value)) : []));
}

export function encodeCsv(rows: readonly CsvRow[]): string {
  if (rows.length === 0) {
    return '';
  }
  return stringify(rows.map(row => [...row]), { record_delimiter: 'unix' });
}

/**
 * Read a CSV file
 * @returns parsed rows, or null when the file does not exist
 */
export async function readCsv(path: string): Promise<string[][] | null> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw new StorageError(path, 'Failed to read file', error);
  }

  try {
    return decodeCsv(text);
  } catch (error) {
    throw new StorageError(path, 'Failed to parse CSV', error);
  }
}

/**
 * Replace the whole file with header + rows.
 * Written to a uniquely named sibling temp file first, then renamed over
 * the original.
 */
export async function writeCsv(path: string, header: CsvRow, rows: readonly CsvRow[]): Promise<void> {
  const tempPath = `${path}.${randomUUID()}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, encodeCsv([header, ...rows]), 'utf-8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new StorageError(path, 'Failed to write file', error);
  }
}

export async function appendCsvRows(path: string, rows: readonly CsvRow[]): Promise<void> {
  try {
    await appendFile(path, encodeCsv(rows), 'utf-8');
  } catch (error) {
    throw new StorageError(path, 'Failed to append to file', error);
  }
}
