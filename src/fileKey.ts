import path from 'node:path';
import { toIsoDate, tryParseIsoDate } from './dates.js';
import type { FileKey } from './types.js';

const FILE_NAME = /^(.+)_(\d{4}-\d{2}-\d{2})\.csv$/;

export function encodeFileKey(key: FileKey): string {
  return `${key.device}_${toIsoDate(key.date)}.csv`;
}

/**
 * Decode `<device>_<YYYY-MM-DD>.csv`. The device is everything before the last
 * underscore. Returns null unless the date is a real day and re-encoding gives
 * back the same name.
 */
export function decodeFileKey(fileOrPath: string): FileKey | null {
  const name = path.basename(fileOrPath);
  const match = FILE_NAME.exec(name);
  if (!match) return null;

  const [, device, dateStr] = match;
  const date = tryParseIsoDate(dateStr);
  if (!date) return null;

  const key = { device, date };
  return encodeFileKey(key) === name ? key : null;
}

export function siblingPath(fileOrPath: string, key: FileKey): string {
  return path.join(path.dirname(fileOrPath), encodeFileKey(key));
}
