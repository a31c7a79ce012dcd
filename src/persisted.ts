import { z } from 'zod';
import { HOURS_PER_DAY } from './timeOfDay.js';
import type {
  AnalysisCore,
  AnalysisResult,
  PersistedAnalysis,
  PersistedTimeRange,
  SpeciesCount,
  SpeciesTimeRange,
  TimeOfDayAnalysis,
} from './types.js';

const Hour = z.number().int().min(0).max(HOURS_PER_DAY - 1);

export const PersistedTimeRangeSchema = z.object({
  hours: z.array(Hour),
  first_seen: Hour,
  last_seen: Hour,
  count: z.number().int(),
});

export const PersistedTimeSummarySchema = z.object({
  first_detection: Hour,
  last_detection: Hour,
  busiest_hour: Hour,
  busiest_hour_count: z.number(),
  avg_per_active_hour: z.number(),
  peak_hours: z.array(Hour),
  early_birds: z.array(z.string()),
  night_owls: z.array(z.string()),
  most_active_species: z.string(),
  most_active_span: z.number().int(),
});

export const PersistedAnalysisSchema = z.object({
  file: z.string().optional(),
  files: z.array(z.string()).optional(),
  local_date: z.string().optional(),
  box_name: z.string().optional(),
  box_location: z.string().optional(),
  utc_files: z.array(z.string()).optional(),
  total_detections: z.number().int(),
  filtered_detections: z.number().int(),
  unique_species: z.number().int(),
  top_species: z.array(z.tuple([z.string(), z.number()])),
  score_threshold: z.number(),
  new_birds: z.array(z.string()),
  hour_counts: z.record(z.string(), z.number()).optional(),
  // Read as entries: z.record skips a "__proto__" key.
  species_time_ranges: z
    .preprocess(
      (value) => (typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.entries(value) : value),
      z.array(z.tuple([z.string(), PersistedTimeRangeSchema]))
    )
    .optional(),
  time_summary: PersistedTimeSummarySchema.optional(),
});

function sortedUnique(values: Iterable<number>): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

function timeToPersisted(time: TimeOfDayAnalysis): Pick<PersistedAnalysis, 'hour_counts' | 'species_time_ranges' | 'time_summary'> {
  const hourCounts: Record<string, number> = Object.fromEntries(
    time.hourCounts.flatMap((count, hour) => (count > 0 ? [[String(hour), count] as const] : []))
  );

  // Own keys: a species may be named "__proto__".
  const ranges: Record<string, PersistedTimeRange> = Object.fromEntries(
    [...time.speciesTimeRanges].map(([species, range]): [string, PersistedTimeRange] => [
      species,
      {
        hours: sortedUnique(range.hours),
        first_seen: range.firstSeen,
        last_seen: range.lastSeen,
        count: range.count,
      },
    ])
  );

  const persisted: Pick<PersistedAnalysis, 'hour_counts' | 'species_time_ranges' | 'time_summary'> = {
    hour_counts: hourCounts,
    species_time_ranges: ranges,
  };

  const { summary } = time;
  if (summary) {
    persisted.time_summary = {
      first_detection: summary.firstDetection,
      last_detection: summary.lastDetection,
      busiest_hour: summary.busiestHour,
      busiest_hour_count: summary.busiestHourCount,
      avg_per_active_hour: summary.avgPerActiveHour,
      peak_hours: sortedUnique(summary.peakHours),
      early_birds: [...summary.earlyBirds].sort(),
      night_owls: [...summary.nightOwls].sort(),
      most_active_species: summary.mostActiveSpecies,
      most_active_span: summary.mostActiveSpan,
    };
  }

  return persisted;
}

type PersistedIdentity = Pick<PersistedAnalysis, 'file' | 'files' | 'local_date' | 'box_name' | 'box_location' | 'utc_files'>;

function identityOf(result: AnalysisResult): PersistedIdentity {
  switch (result.kind) {
    case 'file':
      return { file: result.file };
    case 'files':
      return { files: [...result.files] };
    case 'local-day':
      return {
        local_date: result.localDate,
        box_name: result.boxName,
        box_location: result.boxLocation,
        utc_files: [...result.utcFiles],
      };
  }
}

/** The JSON document handed to the posting side. Field names are part of that contract. */
export function toPersisted(result: AnalysisResult): PersistedAnalysis {
  return {
    ...identityOf(result),
    total_detections: result.totalDetections,
    filtered_detections: result.filteredDetections,
    unique_species: result.uniqueSpecies,
    top_species: result.topSpecies.map(([species, count]): SpeciesCount => [species, count]),
    score_threshold: result.scoreThreshold,
    new_birds: [...result.newBirds].sort(),
    ...(result.time ? timeToPersisted(result.time) : {}),
  };
}

function timeFromPersisted(doc: z.infer<typeof PersistedAnalysisSchema>): TimeOfDayAnalysis | undefined {
  if (!doc.hour_counts && !doc.species_time_ranges) return undefined;

  const hourCounts = new Array<number>(HOURS_PER_DAY).fill(0);
  for (const [hour, count] of Object.entries(doc.hour_counts ?? {})) {
    const index = Number(hour);
    if (Number.isInteger(index) && index >= 0 && index < HOURS_PER_DAY) {
      hourCounts[index] = count;
    }
  }

  const speciesTimeRanges = new Map<string, SpeciesTimeRange>();
  for (const [species, range] of doc.species_time_ranges ?? []) {
    speciesTimeRanges.set(species, {
      hours: sortedUnique(range.hours),
      firstSeen: range.first_seen,
      lastSeen: range.last_seen,
      count: range.count,
    });
  }

  const summary = doc.time_summary;
  return {
    hourCounts,
    speciesTimeRanges,
    summary: summary
      ? {
          firstDetection: summary.first_detection,
          lastDetection: summary.last_detection,
          busiestHour: summary.busiest_hour,
          busiestHourCount: summary.busiest_hour_count,
          avgPerActiveHour: summary.avg_per_active_hour,
          peakHours: summary.peak_hours,
          earlyBirds: summary.early_birds,
          nightOwls: summary.night_owls,
          mostActiveSpecies: summary.most_active_species,
          mostActiveSpan: summary.most_active_span,
        }
      : null,
  };
}

/** Rebuild an in-memory result from a persisted document. Throws a ZodError on bad input. */
export function fromPersisted(input: unknown): AnalysisResult {
  const doc = PersistedAnalysisSchema.parse(input);

  const core: AnalysisCore = {
    totalDetections: doc.total_detections,
    filteredDetections: doc.filtered_detections,
    uniqueSpecies: doc.unique_species,
    topSpecies: doc.top_species.map(([species, count]): SpeciesCount => [species, count]),
    scoreThreshold: doc.score_threshold,
    newBirds: [...doc.new_birds].sort(),
  };

  const time = timeFromPersisted(doc);
  if (time) core.time = time;

  if (doc.local_date !== undefined && doc.box_name !== undefined) {
    return {
      kind: 'local-day',
      localDate: doc.local_date,
      boxName: doc.box_name,
      boxLocation: doc.box_location ?? '',
      utcFiles: doc.utc_files ?? [],
      ...core,
    };
  }
  if (doc.files !== undefined) {
    return { kind: 'files', files: doc.files, ...core };
  }
  return { kind: 'file', file: doc.file ?? '', ...core };
}
