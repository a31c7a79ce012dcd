import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import type { DeviceConfig } from './types.js';

export const DEFAULT_CONFIG_PATH = path.join('config', 'devices.json');

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const DeviceSchema = z.object({
  name: z.string().min(1),
  enabled: z.boolean().default(false),
  location: z.string().default(''),
});

const AnalysisSettingsSchema = z.object({
  score_threshold: z.number().min(0).max(1).default(0.5),
  top_n: z.number().int().positive().default(10),
  exclude_species: z.array(z.string()).default([]),
  lookback_days: z.number().int().min(0).default(7),
});

export const ConfigFileSchema = z.object({
  devices: z.array(DeviceSchema).default([]),
  settings: z
    .object({
      download_dir: z.string().default('./downloads'),
      analysis_dir: z.string().default('./analysis'),
      log_level: LogLevelSchema.default('info'),
      utc_offset_hours: z.number().default(-8),
      analysis: AnalysisSettingsSchema.default({}),
    })
    .default({}),
});

export interface AnalysisSettings {
  scoreThreshold: number;
  topN: number;
  excludeSpecies: string[];
  lookbackDays: number;
}

export interface AppConfig {
  configPath: string;
  devices: DeviceConfig[];
  downloadDir: string;
  analysisDir: string;
  logLevel: LogLevel;
  utcOffsetHours: number;
  analysis: AnalysisSettings;
}

/**
 * Validate a parsed configuration document. Relative directories resolve
 * against the configuration file's directory; LOG_LEVEL in `env` overrides
 * the file's log level.
 */
export function parseConfig(
  data: unknown,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration in ${configPath}:\n${issues}`);
  }

  const { devices, settings } = parsed.data;
  const baseDir = path.dirname(path.resolve(configPath));

  let logLevel: LogLevel = settings.log_level;
  if (env.LOG_LEVEL) {
    const envLevel = LogLevelSchema.safeParse(env.LOG_LEVEL.toLowerCase());
    if (!envLevel.success) {
      throw new ConfigError(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}\nValid options: ${LOG_LEVELS.join(', ')}`);
    }
    logLevel = envLevel.data;
  }

  return {
    configPath,
    devices,
    downloadDir: path.resolve(baseDir, settings.download_dir),
    analysisDir: path.resolve(baseDir, settings.analysis_dir),
    logLevel,
    utcOffsetHours: settings.utc_offset_hours,
    analysis: {
      scoreThreshold: settings.analysis.score_threshold,
      topN: settings.analysis.top_n,
      excludeSpecies: settings.analysis.exclude_species,
      lookbackDays: settings.analysis.lookback_days,
    },
  };
}

export async function loadConfig(
  configPath: string = process.env.BIRDLOG_CONFIG || DEFAULT_CONFIG_PATH
): Promise<AppConfig> {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read configuration ${configPath}: ${message}`);
  }

  return parseConfig(data, configPath);
}

export function enabledDevices(config: AppConfig, name?: string): DeviceConfig[] {
  const devices = config.devices.filter((device) => device.enabled);
  if (name === undefined) return devices;

  const matching = devices.filter((device) => device.name === name);
  if (matching.length === 0) {
    throw new ConfigError(`Device '${name}' not found or not enabled`);
  }
  return matching;
}
