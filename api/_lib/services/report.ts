// api/_lib/services/report.ts
// Plain-text session report for terminals and exported files

import { STAGE_DESCRIPTIONS } from './stageTransitions';
import { DENSITY_EVENT_LABELS, topMarkers } from './sessionEvents';
import type { TranscriptAnalysis } from './transcriptAnalysis';
import type { DensityEvent, DensityEventType, DriftEvent } from '../types/markerTypes';

export interface ReportOptions {
  title?: string;
  generatedAt?: Date;
  /** Events listed per drift group or density type before the rest are summarized */
  maxEventsPerGroup?: number;
  topMarkerCount?: number;
}

const RULE = '='.repeat(80);
const SECTION_RULE = '-'.repeat(40);

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

function signed(v: number): string {
  return `${v >= 0 ? '+' : ''}${v.toFixed(3)}`;
}

function section(lines: string[], title: string): void {
  lines.push(title, SECTION_RULE);
}

function speakerStats(analysis: TranscriptAnalysis): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const u of analysis.units) counts.set(u.speaker, (counts.get(u.speaker) ?? 0) + 1);
  return [...counts.entries()];
}

function groupEvents(events: readonly DriftEvent[]): Map<string, DriftEvent[]> {
  const groups = new Map<string, DriftEvent[]>();
  for (const e of events) {
    const list = groups.get(e.group) ?? [];
    list.push(e);
    groups.set(e.group, list);
  }
  return groups;
}

function groupDensity(events: readonly DensityEvent[]): Map<DensityEventType, DensityEvent[]> {
  const groups = new Map<DensityEventType, DensityEvent[]>();
  for (const e of events) {
    const list = groups.get(e.type) ?? [];
    list.push(e);
    groups.set(e.type, list);
  }
  return groups;
}

function recommendations(analysis: TranscriptAnalysis): string[] {
  const { profile } = analysis;
  const out: string[] = [];
  const driftCount = profile.driftEvents.length;

  if (driftCount === 0) {
    out.push('- Stable conversation without detectable drift');
    out.push('- The conversation stays coherent and focused');
  } else if (driftCount > profile.unitCount * 0.1) {
    out.push('- High drift activity: the conversation shows strong semantic movement');
    out.push('- Review the marked transition points for communication breakdowns');
  } else {
    out.push('- Moderate drift activity: a normal conversational pattern');
    out.push('- Inspect individual events for finer detail');
  }

  const hits = analysis.units.reduce((n, u) => n + u.score.matches.length, 0);
  if (hits > profile.unitCount * 2) {
    out.push('- High marker density points to complex, nuanced communication');
  }
  return out;
}

export function formatReport(analysis: TranscriptAnalysis, options: ReportOptions = {}): string {
  const { profile, units } = analysis;
  const maxEvents = options.maxEventsPerGroup ?? 3;
  const lines: string[] = [];

  lines.push(RULE, 'SPIRAL MARKER ANALYSIS REPORT', RULE);
  if (options.title) lines.push(`Source: ${options.title}`);
  lines.push(`Generated: ${(options.generatedAt ?? new Date()).toISOString()}`, '');

  section(lines, 'BASIC STATISTICS');
  lines.push(`Messages: ${profile.unitCount}`);
  const speakers = speakerStats(analysis);
  lines.push(`Speakers: ${speakers.map(([s]) => s).join(', ')}`);
  for (const [speaker, count] of speakers) {
    lines.push(`  - ${speaker}: ${plural(count, 'message')} (${((count / units.length) * 100).toFixed(1)}%)`);
  }
  const avgLength = units.reduce((n, u) => n + u.text.length, 0) / Math.max(1, units.length);
  lines.push(`Average message length: ${avgLength.toFixed(1)} characters`);
  lines.push(`Marker hits: ${units.reduce((n, u) => n + u.score.matches.length, 0)}`);
  lines.push(`Drift events: ${profile.driftEvents.length}`, '');

  section(lines, 'CATEGORY PROFILE (mean per message)');
  for (const c of profile.categories) {
    lines.push(`  ${c.category.padEnd(8)} ${signed(c.mean)}  ${c.trend}`);
  }
  lines.push(
    `Dominant stage: ${profile.dominant} (${STAGE_DESCRIPTIONS[profile.dominant]}), ` +
    `mean ${signed(profile.dominantScore)}, confidence ${(profile.confidence * 100).toFixed(1)}%`,
    ''
  );

  section(lines, 'TOP ACTIVE MARKERS');
  const top = topMarkers(units, options.topMarkerCount ?? 10);
  if (top.length === 0) {
    lines.push('  None.');
  }
  for (const m of top) {
    lines.push(`  ${m.category}/${m.polarity} ${m.marker}: ${plural(m.hits, 'hit')}`);
  }
  lines.push('');

  section(lines, 'STAGE TRANSITIONS');
  if (profile.transitions.length === 0) {
    lines.push('  None detected.');
  }
  for (const t of profile.transitions) {
    lines.push(`  Message ${t.index}: ${t.from} -> ${t.to} (${t.meaning})`);
  }
  lines.push('');

  section(lines, 'DRIFT EVENTS');
  if (profile.driftEvents.length === 0) {
    lines.push('  No drift markers detected.');
  }
  for (const [group, events] of groupEvents(profile.driftEvents)) {
    lines.push(`${group} (${plural(events.length, 'event')})`);
    for (const e of events.slice(0, maxEvents)) {
      lines.push(`  Message ${e.index}: "${e.match}" [${e.pattern}]`);
    }
    if (events.length > maxEvents) {
      lines.push(`  ... and ${events.length - maxEvents} more`);
    }
  }
  lines.push('');

  section(lines, 'MARKER DENSITY');
  if (analysis.densityEvents.length === 0) {
    lines.push('  No marker condensation detected.');
  }
  for (const [type, events] of groupDensity(analysis.densityEvents)) {
    lines.push(`${DENSITY_EVENT_LABELS[type]} (${plural(events.length, 'event')})`);
    for (const e of events.slice(0, maxEvents)) {
      lines.push(`  Event #${e.eventId}, message ${e.index} (${e.speaker}): ${e.description}`);
      lines.push(`    "${e.excerpt}"`);
    }
    if (events.length > maxEvents) {
      lines.push(`  ... and ${events.length - maxEvents} more`);
    }
  }
  lines.push('');

  section(lines, 'EMOTIONAL INTENSITY');
  const intensities = units.map(u => u.intensity);
  const avg = intensities.reduce((a, b) => a + b, 0) / Math.max(1, intensities.length);
  lines.push(`Average: ${avg.toFixed(1)}/5`);
  lines.push(`Maximum: ${Math.max(0, ...intensities)}/5`);
  lines.push(`Emotional shifts: ${analysis.emotionalDrift.length}`);
  for (const d of analysis.emotionalDrift) {
    lines.push(`  Message ${d.index}: ${d.from} -> ${d.to} (${d.change > 0 ? '+' : ''}${d.change})`);
  }
  lines.push('');

  section(lines, 'RECOMMENDATIONS');
  lines.push(...recommendations(analysis));
  lines.push(RULE);

  return lines.join('\n');
}
