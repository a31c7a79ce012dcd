import path from 'node:path';
import { countBySpecies, mergeCounts, topSpecies } from './aggregate.js';
import { readDetections } from './csv.js';
import { toIsoDate } from './dates.js';
import { filterDetections } from './filter.js';
import { assertTwoFileWindow, loadLocalDay, utcFileNames } from './localDay.js';
import { detectNewSpecies } from './novelty.js';
import { analyzeTimeOfDay, mergeTimeOfDay } from './timeOfDay.js';
import type {
  AnalysisCore,
  AnalysisOutcome,
  AnalyzeOptions,
  CombinedAnalysis,
  DetectionRecord,
  DeviceConfig,
  FileAnalysis,
  LocalDayAnalysis,
  TimeOfDayAnalysis,
} from './types.js';

export const DEFAULT_OPTIONS: Omit<AnalyzeOptions, 'logger'> = {
  scoreThreshold: 0.5,
  topN: 10,
  excludeSpecies: [],
  lookbackDays: 7,
  includeTimeAnalysis: false,
  combineMode: 'top-n',
  utcOffsetHours: -8,
};

interface Summary {
  core: AnalysisCore;
  speciesCounts: Map<string, number>;
}

/**
 * Filter, count and rank one set of records. `anchorPath` is the file whose
 * lookback chain decides which species are new.
 */
async function summarize(
  records: readonly DetectionRecord[],
  anchorPath: string,
  options: AnalyzeOptions
): Promise<Summary | null> {
  const filtered = filterDetections(records, options.scoreThreshold, options.excludeSpecies);
  if (filtered.length === 0) return null;

  const speciesCounts = countBySpecies(filtered);
  const newBirds = await detectNewSpecies(anchorPath, new Set(speciesCounts.keys()), options);

  const core: AnalysisCore = {
    totalDetections: records.length,
    filteredDetections: filtered.length,
    uniqueSpecies: speciesCounts.size,
    topSpecies: topSpecies(speciesCounts, options.topN),
    scoreThreshold: options.scoreThreshold,
    newBirds,
  };

  if (options.includeTimeAnalysis) {
    core.time = analyzeTimeOfDay(filtered);
  }

  options.logger.info(
    `Analysis complete: ${core.uniqueSpecies} species, ` +
      `${core.filteredDetections}/${core.totalDetections} detections above threshold`
  );

  return { core, speciesCounts };
}

type FileRun =
  | { status: 'missing' }
  | { status: 'no-data'; totalDetections: number }
  | { status: 'ok'; result: FileAnalysis; speciesCounts: Map<string, number> };

async function runFile(csvPath: string, options: AnalyzeOptions): Promise<FileRun> {
  options.logger.info(`Analyzing CSV: ${csvPath}`);

  const { found, records } = await readDetections(csvPath, options.logger);
  if (!found) return { status: 'missing' };

  const summary = await summarize(records, csvPath, options);
  if (!summary) {
    options.logger.warn(`No detections above threshold in ${path.basename(csvPath)}`);
    return { status: 'no-data', totalDetections: records.length };
  }

  return {
    status: 'ok',
    result: { kind: 'file', file: path.basename(csvPath), ...summary.core },
    speciesCounts: summary.speciesCounts,
  };
}

export async function analyzeCsvFile(
  csvPath: string,
  options: AnalyzeOptions
): Promise<AnalysisOutcome<FileAnalysis>> {
  const run = await runFile(csvPath, options);
  return run.status === 'ok' ? { status: 'ok', result: run.result } : run;
}

/**
 * Analyze each file and combine. In 'top-n' mode only each file's top list is
 * re-summed, so a species outside every file's top N never reaches the combined
 * ranking; 'exact' re-sums the full per-file species counts.
 */
export async function analyzeCsvFiles(
  csvPaths: readonly string[],
  options: AnalyzeOptions
): Promise<AnalysisOutcome<CombinedAnalysis>> {
  const speciesMaps: Array<Iterable<readonly [string, number]>> = [];
  const timeData: TimeOfDayAnalysis[] = [];
  const newBirds = new Set<string>();
  const files: string[] = [];
  let totalDetections = 0;
  let filteredDetections = 0;
  let anyResult = false;

  for (const csvPath of csvPaths) {
    const run = await runFile(csvPath, options);
    if (run.status === 'missing') continue;

    files.push(path.basename(csvPath));
    if (run.status === 'no-data') {
      totalDetections += run.totalDetections;
      continue;
    }

    const { result } = run;
    anyResult = true;
    totalDetections += result.totalDetections;
    filteredDetections += result.filteredDetections;
    speciesMaps.push(options.combineMode === 'exact' ? run.speciesCounts : result.topSpecies);
    result.newBirds.forEach((bird) => newBirds.add(bird));
    if (result.time) timeData.push(result.time);
  }

  if (files.length === 0) return { status: 'missing' };
  if (!anyResult) return { status: 'no-data', totalDetections };

  const combinedCounts = mergeCounts(speciesMaps);
  const combined: CombinedAnalysis = {
    kind: 'files',
    files,
    totalDetections,
    filteredDetections,
    uniqueSpecies: combinedCounts.size,
    topSpecies: topSpecies(combinedCounts, options.topN),
    scoreThreshold: options.scoreThreshold,
    newBirds: [...newBirds].sort(),
  };

  if (options.includeTimeAnalysis) {
    combined.time = mergeTimeOfDay(timeData);
  }

  return { status: 'ok', result: combined };
}

export interface LocalDayRequest {
  downloadDir: string;
  device: DeviceConfig;
  localDate: Date;
}

/**
 * Stitch the two UTC files covering a local calendar day and analyze only the
 * records stamped with that local date. New species are judged against the
 * lookback chain of the first (same-dated) UTC file.
 */
export async function analyzeLocalDate(
  request: LocalDayRequest,
  options: AnalyzeOptions
): Promise<AnalysisOutcome<LocalDayAnalysis>> {
  assertTwoFileWindow(options.utcOffsetHours);

  const { downloadDir, device, localDate } = request;
  const { utcFiles, records } = await loadLocalDay(downloadDir, device.name, localDate, options.logger);

  if (utcFiles.length === 0) {
    return { status: 'missing' };
  }
  if (records.length === 0) {
    options.logger.warn(`No records for local date ${toIsoDate(localDate)} in ${utcFiles.join(', ')}`);
    return { status: 'no-data', totalDetections: 0 };
  }

  const [anchor] = utcFileNames(device.name, localDate);
  const summary = await summarize(records, path.join(downloadDir, anchor), options);
  if (!summary) {
    return { status: 'no-data', totalDetections: records.length };
  }

  return {
    status: 'ok',
    result: {
      kind: 'local-day',
      localDate: toIsoDate(localDate),
      boxName: device.name,
      boxLocation: device.location,
      utcFiles,
      ...summary.core,
    },
  };
}
