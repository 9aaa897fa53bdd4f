/**
 * Lookup keys from a CSV file
 */

import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import { createError } from '../types.ts';

/**
 * Values of `column` in input order. Cells are kept as text so identifiers
 * with leading zeros survive; blank cells are dropped.
 */
export function parseKeysCsv(text: string, column: string): string[] {
  // raw: no number/date coercion of plain-text cells
  const workbook = XLSX.read(text, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw createError('CONFIGURATION_ERROR', 'Key file is empty');
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: '' });
  const [header, ...body] = rows;
  const index = (header ?? []).findIndex((cell) => String(cell).trim() === column);
  if (index === -1) {
    throw createError('CONFIGURATION_ERROR', `Key file has no "${column}" column`);
  }

  return body.map((row) => String(row[index] ?? '').trim()).filter((key) => key !== '');
}

export async function readKeysFile(path: string, column: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw createError('CONFIGURATION_ERROR', `Cannot read key file ${path}: ${(err as Error).message}`, { cause: err });
  }
  return parseKeysCsv(text, column);
}
