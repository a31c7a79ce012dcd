import { describe, expect, it } from 'vitest';
import { filterDetections } from '../filter.js';
import type { DetectionRecord } from '../types.js';

const record = (species: string, score: number): DetectionRecord => ({ species, score, count: 1 });

describe('filterDetections', () => {
  it('includes a score equal to the threshold and excludes one just below', () => {
    const records = [record('A', 0.5), record('B', 0.5 - 1e-9), record('C', 0.75)];
    expect(filterDetections(records, 0.5, []).map((r) => r.species)).toEqual(['A', 'C']);
  });

  it('drops excluded species', () => {
    const records = [record('Dog', 0.9), record('Bewick\'s Wren', 0.9), record('Engine', 0.95)];
    expect(filterDetections(records, 0.5, ['Dog', 'Engine']).map((r) => r.species)).toEqual(['Bewick\'s Wren']);
  });

  it('drops records whose score is not a number', () => {
    expect(filterDetections([record('A', Number.NaN)], 0, [])).toEqual([]);
  });

  it('preserves order and returns the same sequence when run again', () => {
    const records = [record('C', 0.9), record('A', 0.2), record('B', 0.6), record('C', 0.7), record('Dog', 0.8)];
    const once = filterDetections(records, 0.5, ['Dog']);
    const twice = filterDetections(once, 0.5, ['Dog']);

    expect(once.map((r) => r.species)).toEqual(['C', 'B', 'C']);
    expect(twice).toEqual(once);
    expect(twice.every((r, i) => r === once[i])).toBe(true);
  });
});
