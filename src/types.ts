import type { Logger } from './logger.js';

/** One parsed detection row. Rows that fail validation never become records. */
export interface DetectionRecord {
  readonly score: number;
  readonly species: string;
  readonly count: number;
  readonly localTime?: string;
  readonly localDate?: string;
}

export interface IngestResult {
  found: boolean;
  records: DetectionRecord[];
}

export type SpeciesCount = [species: string, count: number];

export interface SpeciesTimeRange {
  hours: number[];  // sorted, distinct
  firstSeen: number;
  lastSeen: number;
  count: number;
}

export interface TimeSummary {
  firstDetection: number;
  lastDetection: number;
  busiestHour: number;
  busiestHourCount: number;
  avgPerActiveHour: number;
  peakHours: number[];
  earlyBirds: string[];
  nightOwls: string[];
  mostActiveSpecies: string;
  mostActiveSpan: number;
}

export interface TimeOfDayAnalysis {
  hourCounts: number[];  // index = hour 0-23
  speciesTimeRanges: Map<string, SpeciesTimeRange>;
  summary: TimeSummary | null;
}

export interface AnalysisCore {
  totalDetections: number;
  filteredDetections: number;
  uniqueSpecies: number;
  topSpecies: SpeciesCount[];
  scoreThreshold: number;
  newBirds: string[];
  time?: TimeOfDayAnalysis;
}

export interface FileAnalysis extends AnalysisCore {
  kind: 'file';
  file: string;
}

export interface CombinedAnalysis extends AnalysisCore {
  kind: 'files';
  files: string[];
}

export interface LocalDayAnalysis extends AnalysisCore {
  kind: 'local-day';
  localDate: string;  // YYYY-MM-DD
  boxName: string;
  boxLocation: string;
  utcFiles: string[];
}

export type AnalysisResult = FileAnalysis | CombinedAnalysis | LocalDayAnalysis;

export type AnalysisOutcome<T extends AnalysisResult> =
  | { status: 'missing' }
  | { status: 'no-data'; totalDetections: number }
  | { status: 'ok'; result: T };

export type CombineMode = 'top-n' | 'exact';

export interface AnalyzeOptions {
  scoreThreshold: number;
  topN: number;
  excludeSpecies: readonly string[];
  lookbackDays: number;
  includeTimeAnalysis: boolean;
  combineMode: CombineMode;
  utcOffsetHours: number;
  logger: Logger;
}

export interface DeviceConfig {
  name: string;
  enabled: boolean;
  location: string;
}

export interface FileKey {
  device: string;
  date: Date;  // UTC midnight of the file's UTC calendar day
}

/** Persisted analysis document, as read by the posting side. */
export interface PersistedTimeRange {
  hours: number[];
  first_seen: number;
  last_seen: number;
  count: number;
}

export interface PersistedTimeSummary {
  first_detection: number;
  last_detection: number;
  busiest_hour: number;
  busiest_hour_count: number;
  avg_per_active_hour: number;
  peak_hours: number[];
  early_birds: string[];
  night_owls: string[];
  most_active_species: string;
  most_active_span: number;
}

export interface PersistedAnalysis {
  file?: string;
  files?: string[];
  local_date?: string;
  box_name?: string;
  box_location?: string;
  utc_files?: string[];
  total_detections: number;
  filtered_detections: number;
  unique_species: number;
  top_species: SpeciesCount[];
  score_threshold: number;
  new_birds: string[];
  hour_counts?: Record<string, number>;
  species_time_ranges?: Record<string, PersistedTimeRange>;
  time_summary?: PersistedTimeSummary;
}
