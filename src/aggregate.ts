import type { DetectionRecord, SpeciesCount } from './types.js';

/** Summed counts per species, in order of first appearance. */
export function countBySpecies(records: readonly DetectionRecord[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.species, (counts.get(record.species) ?? 0) + record.count);
  }
  return counts;
}

/**
 * Highest counts first. The sort is stable, so equal counts keep their
 * first-appearance order.
 */
export function topSpecies(counts: ReadonlyMap<string, number>, n: number): SpeciesCount[] {
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, n));
}

/** Add several species maps together, keeping first-appearance order across them. */
export function mergeCounts(maps: Iterable<Iterable<readonly [string, number]>>): Map<string, number> {
  const merged = new Map<string, number>();
  for (const map of maps) {
    for (const [species, count] of map) {
      merged.set(species, (merged.get(species) ?? 0) + count);
    }
  }
  return merged;
}
