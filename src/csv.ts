import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import Papa from 'papaparse';
import type { Logger } from './logger.js';
import type { DetectionRecord, IngestResult } from './types.js';

export const COLUMNS = {
  score: 'Score',
  species: 'Species',
  count: 'Count',
  localTime: 'Local Time',
  localDate: 'Local Date',
} as const;

type Row = Record<string, string | undefined>;

function field(row: Row, column: string): string {
  return (row[column] ?? '').trim();
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// Plain decimals only: Number() would also take hex, binary and octal literals.
function parseScore(raw: string): number {
  return DECIMAL.test(raw) ? Number(raw) : NaN;
}

// Absent, fractional, zero or negative counts all count once.
function parseCount(raw: string): number {
  if (!/^\d+$/.test(raw)) return 1;
  const count = Number.parseInt(raw, 10);
  return count >= 1 ? count : 1;
}

export function toDetectionRecord(row: Row): DetectionRecord | null {
  const score = parseScore(field(row, COLUMNS.score));
  const species = field(row, COLUMNS.species);
  if (!Number.isFinite(score) || !species) return null;

  const localTime = field(row, COLUMNS.localTime);
  const localDate = field(row, COLUMNS.localDate);

  return Object.freeze({
    score,
    species,
    count: parseCount(field(row, COLUMNS.count)),
    ...(localTime ? { localTime } : {}),
    ...(localDate ? { localDate } : {}),
  });
}

/** Parse CSV text by header name. Columns other than the known ones are ignored. */
export function parseDetections(text: string): DetectionRecord[] {
  const parsed = Papa.parse<Row>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const records: DetectionRecord[] = [];
  for (const row of parsed.data) {
    const record = toDetectionRecord(row);
    if (record) records.push(record);
  }
  return records;
}

/**
 * Read one daily detection file. A missing file reports `found: false`; an
 * unreadable one is logged and yields no records.
 */
export async function readDetections(csvPath: string, logger: Logger): Promise<IngestResult> {
  if (!existsSync(csvPath)) {
    logger.warn(`CSV file not found: ${csvPath}`);
    return { found: false, records: [] };
  }

  try {
    const text = await readFile(csvPath, 'utf-8');
    return { found: true, records: parseDetections(text) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Error reading CSV ${csvPath}: ${message}`);
    return { found: true, records: [] };
  }
}
