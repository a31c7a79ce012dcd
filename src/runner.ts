import path from 'node:path';
import { analyzeCsvFile, analyzeCsvFiles, analyzeLocalDate } from './analyzer.js';
import { enabledDevices, type AppConfig } from './config.js';
import { currentCalendarDate, defaultLocalDate, defaultUtcDate, toIsoDate } from './dates.js';
import { ConfigError } from './errors.js';
import { encodeFileKey } from './fileKey.js';
import { utcFileNames } from './localDay.js';
import type { Logger } from './logger.js';
import { findCsvFiles, saveAnalysis } from './store.js';
import type { AnalysisOutcome, AnalysisResult, AnalyzeOptions } from './types.js';

/** 'local' stitches two UTC files per day, 'utc' reads one, 'all' reads every CSV undated. */
export type RunMode = 'local' | 'utc' | 'all';

export interface RunRequest {
  mode: RunMode;
  /** Defaults to two days ago in local mode and yesterday in UTC mode. Not used by 'all'. */
  date?: Date;
  box?: string;
  now?: Date;
}

export interface CompletedRun {
  status: 'ok';
  results: AnalysisResult[];
  /** Date the analysis is saved under. */
  saveDate: string;
}

export interface EmptyRun {
  status: 'empty';
  notice: string[];
}

export type RunOutcome = CompletedRun | EmptyRun;

function collect(outcome: AnalysisOutcome<AnalysisResult>, into: AnalysisResult[]): void {
  if (outcome.status === 'ok') into.push(outcome.result);
}

async function runAll(config: AppConfig, request: RunRequest, options: AnalyzeOptions, now: Date): Promise<RunOutcome> {
  const { downloadDir } = config;
  const csvFiles = await findCsvFiles(downloadDir, { device: request.box });
  if (csvFiles.length === 0) {
    return {
      status: 'empty',
      notice: ['No CSV files found matching the criteria.', `Download directory: ${downloadDir}`],
    };
  }

  options.logger.info(`Analyzing all ${csvFiles.length} CSV file(s) (raw UTC data)`);
  const results: AnalysisResult[] = [];
  collect(
    csvFiles.length === 1 ? await analyzeCsvFile(csvFiles[0], options) : await analyzeCsvFiles(csvFiles, options),
    results
  );

  if (results.length === 0) {
    return { status: 'empty', notice: ['No detections above threshold.'] };
  }
  return { status: 'ok', results, saveDate: toIsoDate(currentCalendarDate(now)) };
}

/**
 * Pick the files for the requested mode, analyze each enabled device and
 * report either the results or the notice to show when there is nothing.
 */
export async function runAnalysis(
  config: AppConfig,
  request: RunRequest,
  options: AnalyzeOptions
): Promise<RunOutcome> {
  const now = request.now ?? new Date();
  if (request.mode === 'all') {
    return runAll(config, request, options, now);
  }

  const devices = enabledDevices(config, request.box);
  if (devices.length === 0) {
    throw new ConfigError('No devices enabled in configuration');
  }

  const utc = request.mode === 'utc';
  const date = request.date ?? (utc ? defaultUtcDate(now) : defaultLocalDate(now));
  const saveDate = toIsoDate(date);
  const { downloadDir } = config;
  const results: AnalysisResult[] = [];

  for (const device of devices) {
    if (utc) {
      options.logger.info(`Analyzing ${device.name} for UTC date ${saveDate}`);
      const csvPath = path.join(downloadDir, encodeFileKey({ device: device.name, date }));
      collect(await analyzeCsvFile(csvPath, options), results);
    } else {
      options.logger.info(`Analyzing ${device.name} for local date ${saveDate}`);
      collect(await analyzeLocalDate({ downloadDir, device, localDate: date }, options), results);
    }
  }

  if (results.length > 0) {
    return { status: 'ok', results, saveDate };
  }

  const notice = [`No data found for ${utc ? 'UTC' : 'local'} date ${saveDate}.`, `Download directory: ${downloadDir}`];
  if (!utc) {
    notice.push('', 'Note: Analyzing a local date requires two UTC files.', `For ${saveDate}, you need:`);
    for (const device of devices) {
      const [first, second] = utcFileNames(device.name, date);
      notice.push(`  - ${first} (afternoon/evening UTC)`, `  - ${second} (morning UTC)`);
    }
  }
  return { status: 'empty', notice };
}

/** Persist the first result under the run's date. One document is kept per date. */
export async function saveRun(analysisDir: string, run: CompletedRun, logger: Logger): Promise<string> {
  if (run.results.length > 1) {
    logger.warn('Several devices analyzed; saving the first one only');
  }
  const outputPath = await saveAnalysis(analysisDir, run.saveDate, run.results[0]);
  logger.info(`Analysis saved to: ${outputPath}`);
  return outputPath;
}
