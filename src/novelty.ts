import { existsSync } from 'node:fs';
import path from 'node:path';
import { readDetections } from './csv.js';
import { addDays } from './dates.js';
import { decodeFileKey, siblingPath } from './fileKey.js';
import { filterDetections } from './filter.js';
import type { AnalyzeOptions } from './types.js';

export type NoveltyOptions = Pick<AnalyzeOptions, 'scoreThreshold' | 'excludeSpecies' | 'lookbackDays' | 'logger'>;

/**
 * Files for the same device dated 1..lookbackDays before the given file.
 * Missing days are skipped.
 */
export function findHistoricalFiles(csvPath: string, options: NoveltyOptions): string[] {
  const key = decodeFileKey(csvPath);
  if (!key) {
    options.logger.warn(`Could not extract device and date from filename: ${path.basename(csvPath)}`);
    return [];
  }

  const files: string[] = [];
  for (let daysBack = 1; daysBack <= options.lookbackDays; daysBack++) {
    const candidate = siblingPath(csvPath, { device: key.device, date: addDays(key.date, -daysBack) });
    if (existsSync(candidate)) {
      files.push(candidate);
    }
  }

  options.logger.info(`Found ${files.length} historical files in last ${options.lookbackDays} days`);
  return files;
}

/** Species seen in the given files, filtered the same way as the current analysis. */
export async function historicalSpecies(csvPaths: readonly string[], options: NoveltyOptions): Promise<Set<string>> {
  const species = new Set<string>();

  for (const csvPath of csvPaths) {
    const { records } = await readDetections(csvPath, options.logger);
    for (const record of filterDetections(records, options.scoreThreshold, options.excludeSpecies)) {
      species.add(record.species);
    }
  }

  return species;
}

/**
 * Species in `currentSpecies` not seen in the lookback window before `csvPath`,
 * sorted. With no historical files at all, every current species is new.
 */
export async function detectNewSpecies(
  csvPath: string,
  currentSpecies: ReadonlySet<string>,
  options: NoveltyOptions
): Promise<string[]> {
  if (currentSpecies.size === 0) return [];

  if (!decodeFileKey(csvPath)) {
    options.logger.warn(`Skipping new species check for ${path.basename(csvPath)}: unrecognized filename`);
    return [];
  }

  const historicalFiles = findHistoricalFiles(csvPath, options);
  if (historicalFiles.length === 0) {
    options.logger.info('No historical data found - all birds marked as new');
    return [...currentSpecies].sort();
  }

  const seen = await historicalSpecies(historicalFiles, options);
  const newSpecies = [...currentSpecies].filter((species) => !seen.has(species)).sort();

  if (newSpecies.length > 0) {
    options.logger.info(`Found ${newSpecies.length} new/rare bird(s): ${newSpecies.join(', ')}`);
  }

  return newSpecies;
}
