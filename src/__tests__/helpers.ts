import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { DEFAULT_OPTIONS } from '../analyzer.js';
import { silentLogger } from '../logger.js';
import type { AnalyzeOptions } from '../types.js';

export const HEADER = 'Score,Species,Count,Local Time,Local Date';

export interface RowSpec {
  score?: number | string;
  species: string;
  count?: number | string;
  time?: string;
  date?: string;
}

export function row({ score = 0.9, species, count = 1, time = '08:00:00', date = '20-Jan-2026' }: RowSpec): string {
  return [score, species, count, time, date].join(',');
}

export function csv(rows: RowSpec[], header = HEADER): string {
  return [header, ...rows.map(row)].join('\n') + '\n';
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), 'birdlog-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeCsv(dir: string, name: string, rows: RowSpec[]): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, csv(rows));
  return filePath;
}

export function testOptions(overrides: Partial<AnalyzeOptions> = {}): AnalyzeOptions {
  return { ...DEFAULT_OPTIONS, logger: silentLogger, ...overrides };
}
