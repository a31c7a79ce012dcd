import { describe, expect, it } from 'vitest';
import { analyzeTimeOfDay, hourOf, mergeTimeOfDay, summarizeActivity } from '../timeOfDay.js';
import type { DetectionRecord } from '../types.js';

const at = (species: string, localTime: string | undefined, count = 1): DetectionRecord => ({
  species,
  count,
  score: 0.9,
  ...(localTime ? { localTime } : {}),
});

describe('hourOf', () => {
  it('floors to the hour', () => {
    expect(hourOf('06:59:59')).toBe(6);
    expect(hourOf('00:00:00')).toBe(0);
    expect(hourOf('23:59:59')).toBe(23);
  });

  it('rejects malformed or missing times', () => {
    expect(hourOf(undefined)).toBeNull();
    expect(hourOf('')).toBeNull();
    expect(hourOf('noon')).toBeNull();
    expect(hourOf('24:00:00')).toBeNull();
  });
});

describe('analyzeTimeOfDay', () => {
  const records = [
    at('Robin', '06:59:59'),
    at('Robin', '18:10:00', 2),
    at('Jay', '07:00:00', 3),
    at('Owl', '21:30:00'),
    at('Owl', '05:00:00'),
    at('Unknown', '07:30:00', 4),
    at('Jay', undefined),
    at('Jay', '25:00:00'),
  ];

  const analysis = analyzeTimeOfDay(records);

  it('sums counts per hour, skipping untimed and Unknown records', () => {
    expect(analysis.hourCounts).toHaveLength(24);
    expect(analysis.hourCounts[5]).toBe(1);
    expect(analysis.hourCounts[6]).toBe(1);
    expect(analysis.hourCounts[7]).toBe(3);
    expect(analysis.hourCounts[18]).toBe(2);
    expect(analysis.hourCounts[21]).toBe(1);
    expect(analysis.hourCounts.reduce((a, b) => a + b, 0)).toBe(8);
  });

  it('records sorted distinct hours per species in first-detection order', () => {
    expect([...analysis.speciesTimeRanges.entries()]).toEqual([
      ['Robin', { hours: [6, 18], firstSeen: 6, lastSeen: 18, count: 3 }],
      ['Jay', { hours: [7], firstSeen: 7, lastSeen: 7, count: 3 }],
      ['Owl', { hours: [5, 21], firstSeen: 5, lastSeen: 21, count: 2 }],
    ]);
  });

  it('derives the activity summary', () => {
    expect(analysis.summary).toEqual({
      firstDetection: 5,
      lastDetection: 21,
      busiestHour: 7,
      busiestHourCount: 3,
      avgPerActiveHour: 1.6,
      peakHours: [7, 18],
      earlyBirds: ['Owl', 'Robin'],
      nightOwls: ['Owl'],
      mostActiveSpecies: 'Owl',
      mostActiveSpan: 16,
    });
  });

  it('has no summary when nothing is timed', () => {
    const empty = analyzeTimeOfDay([at('Jay', undefined), at('Unknown', '08:00:00')]);
    expect(empty.speciesTimeRanges.size).toBe(0);
    expect(empty.summary).toBeNull();
  });

  it('lists a duplicate hour once', () => {
    const { speciesTimeRanges } = analyzeTimeOfDay([at('Wren', '09:05:00'), at('Wren', '09:45:00')]);
    expect(speciesTimeRanges.get('Wren')).toEqual({ hours: [9], firstSeen: 9, lastSeen: 9, count: 2 });
  });
});

describe('summarizeActivity', () => {
  it('takes the earliest hour and the first species on ties', () => {
    const { hourCounts, speciesTimeRanges } = analyzeTimeOfDay([
      at('Towhee', '03:00:00', 2),
      at('Towhee', '09:00:00'),
      at('Finch', '09:00:00'),
      at('Finch', '15:00:00'),
    ]);

    const summary = summarizeActivity(hourCounts, speciesTimeRanges);
    expect(summary?.busiestHour).toBe(3);
    expect(summary?.busiestHourCount).toBe(2);
    expect(summary?.mostActiveSpecies).toBe('Towhee');
    expect(summary?.mostActiveSpan).toBe(6);
    // 5 detections over 3 active hours
    expect(summary?.peakHours).toEqual([3, 9]);
  });
});

describe('mergeTimeOfDay', () => {
  it('adds hour buckets and unions species hours', () => {
    const first = analyzeTimeOfDay([at('Robin', '06:00:00'), at('Jay', '10:00:00')]);
    const second = analyzeTimeOfDay([at('Robin', '20:00:00', 2), at('Robin', '06:30:00')]);

    const merged = mergeTimeOfDay([first, second]);
    expect(merged.hourCounts[6]).toBe(2);
    expect(merged.hourCounts[10]).toBe(1);
    expect(merged.hourCounts[20]).toBe(2);
    expect([...merged.speciesTimeRanges.entries()]).toEqual([
      ['Robin', { hours: [6, 20], firstSeen: 6, lastSeen: 20, count: 4 }],
      ['Jay', { hours: [10], firstSeen: 10, lastSeen: 10, count: 1 }],
    ]);
    expect(merged.summary?.mostActiveSpecies).toBe('Robin');
  });
});
