#!/usr/bin/env node

import 'dotenv/config';
import { Command, Option } from 'commander';
import { loadConfig, type AppConfig } from './config.js';
import { parseIsoDate } from './dates.js';
import { ConfigError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { formatJson, formatJsonList, formatText } from './output.js';
import { runAnalysis, saveRun } from './runner.js';
import { loadAnalysis } from './store.js';
import type { AnalyzeOptions } from './types.js';

type OutputFormat = 'text' | 'json';

interface AnalyzeCliOptions {
  date?: string;
  box?: string;
  all: boolean;
  utc: boolean;
  config?: string;
  threshold?: string;
  top?: string;
  time: boolean;
  exact: boolean;
  save: boolean;
  output: string;
  verbose: boolean;
}

interface ShowCliOptions {
  config?: string;
  output: string;
}

function parseOutput(value: string): OutputFormat {
  if (value !== 'text' && value !== 'json') {
    throw new ConfigError(`--output must be "text" or "json", got "${value}"`);
  }
  return value;
}

function parseThreshold(value: string): number {
  const threshold = Number(value);
  if (value.trim() === '' || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ConfigError('--threshold must be a number between 0.0 and 1.0');
  }
  return threshold;
}

function parseTop(value: string): number {
  const top = Number(value);
  if (!Number.isInteger(top) || top <= 0) {
    throw new ConfigError('--top must be a positive integer');
  }
  return top;
}

function buildOptions(config: AppConfig, opts: AnalyzeCliOptions, logger: Logger): AnalyzeOptions {
  return {
    scoreThreshold: opts.threshold !== undefined ? parseThreshold(opts.threshold) : config.analysis.scoreThreshold,
    topN: opts.top !== undefined ? parseTop(opts.top) : config.analysis.topN,
    excludeSpecies: config.analysis.excludeSpecies,
    lookbackDays: config.analysis.lookbackDays,
    includeTimeAnalysis: opts.time,
    combineMode: opts.exact ? 'exact' : 'top-n',
    utcOffsetHours: config.utcOffsetHours,
    logger,
  };
}

// In JSON mode stdout carries only the document; notices go to stderr.
function notify(format: OutputFormat, lines: string[]): void {
  const write = format === 'json' ? console.error : console.log;
  write('\n' + lines.join('\n'));
}

async function runAnalyze(opts: AnalyzeCliOptions): Promise<void> {
  const format = parseOutput(opts.output);
  const config = await loadConfig(opts.config);
  const logger = createLogger(opts.verbose ? 'debug' : config.logLevel);
  const options = buildOptions(config, opts, logger);

  const run = await runAnalysis(
    config,
    {
      mode: opts.all ? 'all' : opts.utc ? 'utc' : 'local',
      date: opts.date ? parseIsoDate(opts.date) : undefined,
      box: opts.box,
    },
    options
  );

  if (run.status === 'empty') {
    notify(format, run.notice);
    return;
  }

  if (format === 'json') {
    console.log(formatJsonList(run.results));
  } else {
    for (const result of run.results) {
      console.log('\n' + formatText(result, { lookbackDays: options.lookbackDays }));
    }
  }

  if (opts.save) {
    const outputPath = await saveRun(config.analysisDir, run, logger);
    notify(format, [`Analysis saved to: ${outputPath}`]);
  }
}

async function runShow(dateStr: string, opts: ShowCliOptions): Promise<void> {
  const format = parseOutput(opts.output);
  parseIsoDate(dateStr);
  const config = await loadConfig(opts.config);

  const result = await loadAnalysis(config.analysisDir, dateStr);
  if (!result) {
    console.error(`No analysis found for ${dateStr}.`);
    console.error(`Run: birdlog-digest analyze --date ${dateStr} --save`);
    process.exitCode = 1;
    return;
  }

  console.log(
    format === 'json' ? formatJson(result) : formatText(result, { lookbackDays: config.analysis.lookbackDays })
  );
}

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : 'Unknown error';
  console.error(`Error: ${message}`);
  process.exit(1);
}

const program = new Command();

program
  .name('birdlog-digest')
  .description('Summarize daily bird detection logs: top species, new arrivals and activity by hour')
  .version('1.0.0');

program
  .command('analyze')
  .description('Analyze detection CSV files for a local date (default: two days ago)')
  .option('-d, --date <date>', 'Date to analyze (YYYY-MM-DD)')
  .option('-b, --box <name>', 'Only analyze this device')
  .addOption(new Option('--all', 'Analyze every CSV in the download directory (raw UTC data)').default(false))
  .addOption(new Option('--utc', 'Analyze the raw UTC file for the date (default: yesterday)').default(false).conflicts('all'))
  .option('-c, --config <path>', 'Path to config file (default: config/devices.json)')
  .option('-t, --threshold <score>', 'Override score threshold (0.0 to 1.0)')
  .option('-n, --top <count>', 'Override number of top species to show')
  .option('--time', 'Include time-of-day analysis', false)
  .option('--exact', 'Combine multiple files from full species counts instead of per-file top lists', false)
  .option('-s, --save', 'Save the analysis as JSON in the analysis directory', false)
  .option('-o, --output <format>', 'Output format: text or json', 'text')
  .option('-v, --verbose', 'Show debug logging', false)
  .action(async (opts: AnalyzeCliOptions) => {
    try {
      await runAnalyze(opts);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('show')
  .description('Print a saved analysis')
  .argument('<date>', 'Date of the saved analysis (YYYY-MM-DD)')
  .option('-c, --config <path>', 'Path to config file (default: config/devices.json)')
  .option('-o, --output <format>', 'Output format: text or json', 'text')
  .action(async (date: string, opts: ShowCliOptions) => {
    try {
      await runShow(date, opts);
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
