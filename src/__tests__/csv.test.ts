import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import path from 'node:path';
import { parseDetections, readDetections } from '../csv.js';
import { silentLogger } from '../logger.js';
import { csv, makeTempDir, removeDir, writeCsv } from './helpers.js';

describe('parseDetections', () => {
  it('reads columns by header name, ignoring order and extra columns', () => {
    const text = [
      'Local Date,Extra,Species,Score,Local Time',
      '20-Jan-2026,x,American Robin,0.8,07:15:00',
    ].join('\n');

    expect(parseDetections(text)).toEqual([
      { score: 0.8, species: 'American Robin', count: 1, localTime: '07:15:00', localDate: '20-Jan-2026' },
    ]);
  });

  it('drops rows with a bad score or no species and keeps the rest', () => {
    const text = csv([
      { score: 'abc', species: 'Song Sparrow' },
      { score: '', species: 'Song Sparrow' },
      { score: '0x1', species: 'Song Sparrow' },
      { score: '0b1', species: 'Song Sparrow' },
      { score: '0o1', species: 'Song Sparrow' },
      { score: 'Infinity', species: 'Song Sparrow' },
      { score: 0.7, species: '' },
      { score: 0.6, species: 'Bushtit' },
      { score: '.75', species: 'Wrentit' },
      { score: '1e0', species: 'Hutton\'s Vireo' },
    ]);

    expect(parseDetections(text).map((r) => [r.species, r.score])).toEqual([
      ['Bushtit', 0.6],
      ['Wrentit', 0.75],
      ["Hutton's Vireo", 1],
    ]);
  });

  it('counts a row once when Count is missing, non-numeric, zero or negative', () => {
    const text = csv([
      { species: 'A', count: '' },
      { species: 'B', count: 'many' },
      { species: 'C', count: '0' },
      { species: 'D', count: '-2' },
      { species: 'E', count: '2.5' },
      { species: 'F', count: '3' },
    ]);

    expect(parseDetections(text).map((r) => [r.species, r.count])).toEqual([
      ['A', 1],
      ['B', 1],
      ['C', 1],
      ['D', 1],
      ['E', 1],
      ['F', 3],
    ]);
  });

  it('handles a byte order mark, quoted commas and missing time columns', () => {
    const text = '\uFEFFScore,Species,Count\n"0.7","Sparrow, House",2\n';

    const [record] = parseDetections(text);
    expect(record).toEqual({ score: 0.7, species: 'Sparrow, House', count: 2 });
    expect(record.localTime).toBeUndefined();
    expect(record.localDate).toBeUndefined();
  });

  it('returns frozen records', () => {
    const [record] = parseDetections(csv([{ species: 'Wrentit' }]));
    expect(Object.isFrozen(record)).toBe(true);
  });
});

describe('readDetections', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reports a missing file as not found', async () => {
    const result = await readDetections(path.join(dir, 'yard_2026-01-20.csv'), silentLogger);
    expect(result).toEqual({ found: false, records: [] });
  });

  it('distinguishes an existing empty file from a missing one', async () => {
    const filePath = await writeCsv(dir, 'yard_2026-01-20.csv', []);
    expect(await readDetections(filePath, silentLogger)).toEqual({ found: true, records: [] });
  });

  it('reads every valid row of a file', async () => {
    const filePath = await writeCsv(dir, 'yard_2026-01-20.csv', [
      { species: 'Anna\'s Hummingbird', count: 2 },
      { score: 'bad', species: 'Steller\'s Jay' },
      { species: 'Dark-eyed Junco' },
    ]);

    const { found, records } = await readDetections(filePath, silentLogger);
    expect(found).toBe(true);
    expect(records.map((r) => r.species)).toEqual(['Anna\'s Hummingbird', 'Dark-eyed Junco']);
  });
});
