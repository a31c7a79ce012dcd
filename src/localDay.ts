import path from 'node:path';
import { readDetections } from './csv.js';
import { addDays, toLocalDateLabel } from './dates.js';
import { ConfigError } from './errors.js';
import { encodeFileKey } from './fileKey.js';
import type { Logger } from './logger.js';
import type { DetectionRecord } from './types.js';

export interface LocalDayRecords {
  /** Names of the UTC files that were actually found. */
  utcFiles: string[];
  /** Records from those files whose Local Date matches the target day. */
  records: DetectionRecord[];
}

/**
 * A local day D runs from UTC `D 00:00 - offset` to `D+1 00:00 - offset`, which
 * stays inside the UTC files for D and D+1 only when -24 < offset <= 0.
 */
export function assertTwoFileWindow(utcOffsetHours: number): void {
  if (!Number.isFinite(utcOffsetHours) || utcOffsetHours > 0 || utcOffsetHours <= -24) {
    throw new ConfigError(
      `UTC offset ${utcOffsetHours}h is not supported: a local day must fall within ` +
        'the UTC files for the same date and the day after (-24 < offset <= 0)'
    );
  }
}

/** The two UTC-dated file names that can hold records for a local day. */
export function utcFileNames(device: string, localDate: Date): [string, string] {
  return [
    encodeFileKey({ device, date: localDate }),
    encodeFileKey({ device, date: addDays(localDate, 1) }),
  ];
}

export async function loadLocalDay(
  downloadDir: string,
  device: string,
  localDate: Date,
  logger: Logger
): Promise<LocalDayRecords> {
  const label = toLocalDateLabel(localDate);
  const utcFiles: string[] = [];
  const merged: DetectionRecord[] = [];

  for (const name of utcFileNames(device, localDate)) {
    const { found, records } = await readDetections(path.join(downloadDir, name), logger);
    if (!found) continue;

    utcFiles.push(name);
    merged.push(...records);
    logger.debug(`Loaded ${records.length} records from ${name}`);
  }

  return {
    utcFiles,
    records: merged.filter((record) => record.localDate === label),
  };
}
