import { readFile, writeFile, mkdir, readdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { toIsoDate } from './dates.js';
import { decodeFileKey } from './fileKey.js';
import { formatJson } from './output.js';
import { fromPersisted } from './persisted.js';
import type { AnalysisResult } from './types.js';

export interface CsvFilter {
  device?: string;
  date?: Date;
}

/** Daily detection files in `dir`, sorted by name. */
export async function findCsvFiles(dir: string, filter: CsvFilter = {}): Promise<string[]> {
  if (!existsSync(dir)) return [];

  const entries = await readdir(dir);
  const wantedDate = filter.date ? toIsoDate(filter.date) : undefined;

  return entries
    .filter((name) => name.toLowerCase().endsWith('.csv'))
    .filter((name) => {
      if (filter.device === undefined && wantedDate === undefined) return true;
      const key = decodeFileKey(name);
      if (!key) return false;
      if (filter.device !== undefined && key.device !== filter.device) return false;
      return wantedDate === undefined || toIsoDate(key.date) === wantedDate;
    })
    .sort()
    .map((name) => path.join(dir, name));
}

export function analysisPath(dir: string, dateStr: string): string {
  return path.join(dir, `${dateStr}.json`);
}

export async function saveAnalysis(dir: string, dateStr: string, result: AnalysisResult): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = analysisPath(dir, dateStr);
  await writeFile(filePath, formatJson(result) + '\n');
  return filePath;
}

export async function loadAnalysis(dir: string, dateStr: string): Promise<AnalysisResult | null> {
  const filePath = analysisPath(dir, dateStr);
  if (!existsSync(filePath)) {
    return null;
  }

  const data = await readFile(filePath, 'utf-8');
  return fromPersisted(JSON.parse(data));
}
