import { toPersisted } from './persisted.js';
import { HOURS_PER_DAY } from './timeOfDay.js';
import type { AnalysisResult, SpeciesCount, SpeciesTimeRange, TimeSummary } from './types.js';

const RULE = '-'.repeat(60);
const MAX_BAR = 50;

export interface TextOptions {
  lookbackDays?: number;
}

export function formatJson(result: AnalysisResult): string {
  return JSON.stringify(toPersisted(result), null, 2);
}

/** One document for a single result, otherwise an array of documents. */
export function formatJsonList(results: readonly AnalysisResult[]): string {
  return results.length === 1 ? formatJson(results[0]) : JSON.stringify(results.map(toPersisted), null, 2);
}

function title(result: AnalysisResult): string {
  switch (result.kind) {
    case 'file':
      return `Bird Detection Summary: ${result.file}`;
    case 'files':
      return `Bird Detection Summary: ${result.files.length} files`;
    case 'local-day':
      return `Bird Detection Summary: ${result.boxName} - ${result.localDate}`;
  }
}

const hh = (hour: number) => String(hour).padStart(2, '0');

export function formatText(result: AnalysisResult, options: TextOptions = {}): string {
  const lines: string[] = [];

  lines.push(title(result));
  lines.push('='.repeat(60));
  if (result.kind === 'local-day') {
    if (result.boxLocation) lines.push(`Location: ${result.boxLocation}`);
    lines.push(`UTC files: ${result.utcFiles.join(', ')}`);
  }
  lines.push(`Total detections: ${result.totalDetections}`);
  lines.push(`Above threshold (${result.scoreThreshold}): ${result.filteredDetections}`);
  lines.push(`Unique species: ${result.uniqueSpecies}`);

  if (result.newBirds.length > 0) {
    lines.push('');
    lines.push(`New/Rare Birds (not seen in last ${options.lookbackDays ?? 7} days):`);
    lines.push(RULE);
    for (const bird of result.newBirds) {
      lines.push(`  * ${bird}`);
    }
  }

  lines.push('');
  lines.push(`Top ${result.topSpecies.length} Species:`);
  lines.push(RULE);
  result.topSpecies.forEach(([species, count], i) => {
    lines.push(`${String(i + 1).padStart(2)}. ${species.padEnd(30)} ${String(count).padStart(4)} detections`);
  });

  if (result.time) {
    lines.push('');
    lines.push(formatHourlyActivity(result.time.hourCounts));
    lines.push('');
    lines.push(formatSpeciesTimeRanges(result.time.speciesTimeRanges, result.topSpecies));
    if (result.time.summary) {
      lines.push('');
      lines.push(formatActivitySummary(result.time.summary));
    }
  }

  return lines.join('\n');
}

export function formatHourlyActivity(hourCounts: readonly number[]): string {
  const lines = ['Detections by Hour of Day:', RULE];

  for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
    const count = hourCounts[hour] ?? 0;
    const bar = '█'.repeat(Math.min(count, MAX_BAR));
    lines.push(`${String(hour).padStart(2)}:00  ${String(count).padStart(4)}  ${bar}`.trimEnd());
  }

  return lines.join('\n');
}

/**
 * One 24-hour timeline per species. Follows the top species list when there is
 * one, otherwise all species by count.
 */
export function formatSpeciesTimeRanges(
  ranges: ReadonlyMap<string, SpeciesTimeRange>,
  topSpecies: readonly SpeciesCount[] = []
): string {
  const lines = ['Species Activity Time Ranges:', RULE];

  const species = topSpecies.length > 0
    ? topSpecies.map(([name]) => name)
    : [...ranges.entries()].sort((a, b) => b[1].count - a[1].count).map(([name]) => name);

  for (const name of species) {
    const range = ranges.get(name);
    if (!range) continue;

    const timeRange = `${hh(range.firstSeen)}:00-${hh(range.lastSeen)}:59`;
    const timeline = new Array<string>(HOURS_PER_DAY).fill('·');
    for (const hour of range.hours) timeline[hour] = '█';

    lines.push(`${name.slice(0, 30).padEnd(30)} ${timeRange.padEnd(13)} (${String(range.hours.length).padStart(2)}h)`);
    lines.push('  0    4    8   12   16   20   24');
    lines.push(`  ${timeline.join('')}`);
  }

  return lines.join('\n');
}

export function formatActivitySummary(summary: TimeSummary): string {
  const lines = ['Activity Summary:', RULE];

  lines.push(`First detection: ${hh(summary.firstDetection)}:00`);
  lines.push(`Last detection: ${hh(summary.lastDetection)}:00`);
  lines.push(`Busiest hour: ${hh(summary.busiestHour)}:00 (${summary.busiestHourCount} detections)`);
  lines.push(`Average per active hour: ${summary.avgPerActiveHour.toFixed(1)}`);
  lines.push(`Peak hours: ${summary.peakHours.map((hour) => `${hh(hour)}:00`).join(', ')}`);
  if (summary.earlyBirds.length > 0) {
    lines.push(`Early birds (before 07:00): ${summary.earlyBirds.join(', ')}`);
  }
  if (summary.nightOwls.length > 0) {
    lines.push(`Night owls (19:00 and later): ${summary.nightOwls.join(', ')}`);
  }
  lines.push(`Most active: ${summary.mostActiveSpecies} (${summary.mostActiveSpan}h span)`);

  return lines.join('\n');
}
