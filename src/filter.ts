import type { DetectionRecord } from './types.js';

/**
 * Keep records scoring at or above the threshold whose species is not excluded.
 * Order is preserved.
 */
export function filterDetections(
  records: readonly DetectionRecord[],
  threshold: number,
  excludeSpecies: readonly string[]
): DetectionRecord[] {
  const excluded = new Set(excludeSpecies);
  return records.filter(
    (record) => Number.isFinite(record.score) && record.score >= threshold && !excluded.has(record.species)
  );
}
