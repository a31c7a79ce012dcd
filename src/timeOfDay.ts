import type { DetectionRecord, SpeciesTimeRange, TimeOfDayAnalysis, TimeSummary } from './types.js';

export const HOURS_PER_DAY = 24;
export const EARLY_BIRD_BEFORE = 7;
export const NIGHT_OWL_FROM = 19;

const LOCAL_TIME = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/** Hour of an HH:MM:SS local time, or null when the time is malformed. */
export function hourOf(localTime: string | undefined): number | null {
  if (!localTime) return null;
  const match = LOCAL_TIME.exec(localTime);
  if (!match) return null;

  const hour = Number(match[1]);
  return hour < HOURS_PER_DAY ? hour : null;
}

function emptyHours(): number[] {
  return new Array<number>(HOURS_PER_DAY).fill(0);
}

function toRange(hours: Set<number>, count: number): SpeciesTimeRange {
  const sorted = [...hours].sort((a, b) => a - b);
  return {
    hours: sorted,
    firstSeen: sorted[0],
    lastSeen: sorted[sorted.length - 1],
    count,
  };
}

/**
 * Bucket filtered records by local hour. Records without a usable time, and
 * records of species "Unknown", are left out here only.
 */
export function analyzeTimeOfDay(records: readonly DetectionRecord[]): TimeOfDayAnalysis {
  const hourCounts = emptyHours();
  const seen = new Map<string, { hours: Set<number>; count: number }>();

  for (const record of records) {
    const hour = hourOf(record.localTime);
    if (hour === null || record.species === 'Unknown') continue;

    hourCounts[hour] += record.count;

    let entry = seen.get(record.species);
    if (!entry) {
      entry = { hours: new Set(), count: 0 };
      seen.set(record.species, entry);
    }
    entry.hours.add(hour);
    entry.count += record.count;
  }

  const speciesTimeRanges = new Map<string, SpeciesTimeRange>();
  for (const [species, { hours, count }] of seen) {
    speciesTimeRanges.set(species, toRange(hours, count));
  }

  return {
    hourCounts,
    speciesTimeRanges,
    summary: summarizeActivity(hourCounts, speciesTimeRanges),
  };
}

/** Sum hour buckets and union species hours across several analyses. */
export function mergeTimeOfDay(analyses: readonly TimeOfDayAnalysis[]): TimeOfDayAnalysis {
  const hourCounts = emptyHours();
  const merged = new Map<string, { hours: Set<number>; count: number }>();

  for (const analysis of analyses) {
    analysis.hourCounts.forEach((count, hour) => {
      hourCounts[hour] += count;
    });

    for (const [species, range] of analysis.speciesTimeRanges) {
      const entry = merged.get(species);
      if (entry) {
        range.hours.forEach((hour) => entry.hours.add(hour));
        entry.count += range.count;
      } else {
        merged.set(species, { hours: new Set(range.hours), count: range.count });
      }
    }
  }

  const speciesTimeRanges = new Map<string, SpeciesTimeRange>();
  for (const [species, { hours, count }] of merged) {
    speciesTimeRanges.set(species, toRange(hours, count));
  }

  return {
    hourCounts,
    speciesTimeRanges,
    summary: summarizeActivity(hourCounts, speciesTimeRanges),
  };
}

export function summarizeActivity(
  hourCounts: readonly number[],
  speciesTimeRanges: ReadonlyMap<string, SpeciesTimeRange>
): TimeSummary | null {
  const activeHours = hourCounts
    .map((count, hour) => ({ hour, count }))
    .filter(({ count }) => count > 0);

  if (activeHours.length === 0 || speciesTimeRanges.size === 0) {
    return null;
  }

  let busiest = activeHours[0];
  for (const entry of activeHours) {
    if (entry.count > busiest.count) busiest = entry;
  }

  const total = activeHours.reduce((sum, { count }) => sum + count, 0);
  const avgPerActiveHour = total / activeHours.length;

  const earlyBirds: string[] = [];
  const nightOwls: string[] = [];
  let mostActiveSpecies = '';
  let mostActiveSpan = -1;

  for (const [species, range] of speciesTimeRanges) {
    if (range.hours.some((hour) => hour < EARLY_BIRD_BEFORE)) earlyBirds.push(species);
    if (range.hours.some((hour) => hour >= NIGHT_OWL_FROM)) nightOwls.push(species);

    const span = range.lastSeen - range.firstSeen;
    if (span > mostActiveSpan) {
      mostActiveSpecies = species;
      mostActiveSpan = span;
    }
  }

  return {
    firstDetection: activeHours[0].hour,
    lastDetection: activeHours[activeHours.length - 1].hour,
    busiestHour: busiest.hour,
    busiestHourCount: busiest.count,
    avgPerActiveHour,
    peakHours: activeHours.filter(({ count }) => count >= avgPerActiveHour).map(({ hour }) => hour),
    earlyBirds: earlyBirds.sort(),
    nightOwls: nightOwls.sort(),
    mostActiveSpecies,
    mostActiveSpan,
  };
}
