import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parseIsoDate } from '../dates.js';
import { analysisPath, findCsvFiles, loadAnalysis, saveAnalysis } from '../store.js';
import type { FileAnalysis } from '../types.js';
import { makeTempDir, removeDir, writeCsv } from './helpers.js';

describe('store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('finds CSV files by device and date', async () => {
    await writeCsv(dir, 'yard_2026-01-21.csv', []);
    await writeCsv(dir, 'yard_2026-01-20.csv', []);
    await writeCsv(dir, 'creek_2026-01-20.csv', []);
    await writeCsv(dir, 'notes.csv', []);
    await writeFile(path.join(dir, 'yard_2026-01-22.json'), '{}');

    expect(await findCsvFiles(dir)).toEqual([
      path.join(dir, 'creek_2026-01-20.csv'),
      path.join(dir, 'notes.csv'),
      path.join(dir, 'yard_2026-01-20.csv'),
      path.join(dir, 'yard_2026-01-21.csv'),
    ]);
    expect(await findCsvFiles(dir, { device: 'yard' })).toEqual([
      path.join(dir, 'yard_2026-01-20.csv'),
      path.join(dir, 'yard_2026-01-21.csv'),
    ]);
    expect(await findCsvFiles(dir, { date: parseIsoDate('2026-01-20') })).toEqual([
      path.join(dir, 'creek_2026-01-20.csv'),
      path.join(dir, 'yard_2026-01-20.csv'),
    ]);
    expect(await findCsvFiles(path.join(dir, 'absent'))).toEqual([]);
  });

  it('saves an analysis under its date and loads it back', async () => {
    const result: FileAnalysis = {
      kind: 'file',
      file: 'yard_2026-01-20.csv',
      totalDetections: 3,
      filteredDetections: 2,
      uniqueSpecies: 2,
      topSpecies: [
        ['Towhee', 1],
        ['Junco', 1],
      ],
      scoreThreshold: 0.5,
      newBirds: ['Junco'],
    };

    const analysisDir = path.join(dir, 'analysis');
    const saved = await saveAnalysis(analysisDir, '2026-01-20', result);

    expect(saved).toBe(analysisPath(analysisDir, '2026-01-20'));
    expect(JSON.parse(await readFile(saved, 'utf-8')).top_species).toEqual([
      ['Towhee', 1],
      ['Junco', 1],
    ]);
    expect(await loadAnalysis(analysisDir, '2026-01-20')).toEqual(result);
    expect(await loadAnalysis(analysisDir, '2026-01-21')).toBeNull();

    // Saving again into the existing directory replaces the document.
    await saveAnalysis(analysisDir, '2026-01-20', { ...result, newBirds: [] });
    expect((await loadAnalysis(analysisDir, '2026-01-20'))?.newBirds).toEqual([]);
  });
});
