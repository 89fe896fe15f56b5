// Filename: features/fallback/csvTable.ts
/**
 * CSV → TableRecord conversion for the static fallback files.
 *
 * The files come from the upstream site's download section and are not consistent:
 * some are UTF-8, some Latin-1, and the delimiter varies between files.
 */

import { parse } from 'csv-parse/sync';
import type { TableBodyGroup, TableRecord, TableRow } from '../../core/types.js';

export const CANDIDATE_DELIMITERS = [';', ',', '\t', '|'] as const;
export type CsvDelimiter = (typeof CANDIDATE_DELIMITERS)[number];

const DEFAULT_DELIMITER: CsvDelimiter = ';';

/** First-cell markers of summary rows. */
export const TOTAL_ROW_KEYWORDS = ['total', 'soma', 'subtotal', 'geral', 'consolidado', 'média', 'media'];

/**
 * Decodes file bytes as UTF-8, falling back to Latin-1 when the bytes are not valid UTF-8.
 */
export function decodeCsvBuffer(buffer: Buffer): { text: string; encoding: 'utf-8' | 'latin1' } {
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    return { text, encoding: 'utf-8' };
  } catch {
    return { text: buffer.toString('latin1'), encoding: 'latin1' };
  }
}

/**
 * Picks the delimiter that occurs most often in the first non-empty line.
 * Ties go to the earlier candidate; no candidate at all gives ';'.
 */
export function detectDelimiter(text: string): CsvDelimiter {
  const firstLine = text.split(/\r?\n/).find((line) => line.trim() !== '') ?? '';
  let best: CsvDelimiter = DEFAULT_DELIMITER;
  let bestCount = 0;
  for (const candidate of CANDIDATE_DELIMITERS) {
    const count = firstLine.split(candidate).length - 1;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

function isRowList(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));
}

export function isTotalRow(row: TableRow): boolean {
  const first = (row[0] ?? '').toLowerCase();
  return TOTAL_ROW_KEYWORDS.some((keyword) => first.includes(keyword));
}

/**
 * Parses CSV text into a TableRecord.
 * - the first row gives the column names and becomes the single header row
 * - rows are trimmed and padded or cut to the header width; all-empty rows are skipped
 * - summary rows (see TOTAL_ROW_KEYWORDS) go to the footer, the rest become body groups
 * @returns null when there is no data row
 * @throws when the text is not parseable CSV
 */
export function parseCsvTable(text: string, delimiter: CsvDelimiter = detectDelimiter(text)): TableRecord | null {
  const rows: unknown = parse(text, {
    delimiter,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  });
  if (!isRowList(rows) || rows.length === 0) return null;

  const [columns, ...dataRows] = rows.map((row) => row.map((cell) => cell.trim()));
  const body: TableBodyGroup[] = [];
  const footer: TableRow[] = [];

  for (const raw of dataRows) {
    if (raw.every((cell) => cell === '')) continue;
    const values = columns.map((_, index) => raw[index] ?? '');
    if (isTotalRow(values)) {
      footer.push(values);
    } else {
      body.push({ item_data: values, sub_items: [] });
    }
  }

  if (body.length === 0 && footer.length === 0) return null;
  return { header: [columns], body, footer };
}

/**
 * Decodes and parses a CSV file's bytes.
 */
export function parseCsvBuffer(buffer: Buffer): TableRecord | null {
  const { text } = decodeCsvBuffer(buffer);
  return parseCsvTable(text);
}
