// api/_lib/services/sessionEvents.ts
// Unit-level events beyond drift markers: intensity swings and marker condensation

import type {
  Category,
  CategoryActivity,
  DensityEvent,
  DensityEventType,
  DriftEvent,
  EmotionalDriftEvent,
  MarkerActivity,
  ScoreResult,
} from '../types/markerTypes';

export const EMOTIONAL_DRIFT_THRESHOLD = 2;
export const DENSITY_THRESHOLD = 3;
const EXCERPT_CHARS = 100;

/** What the event detectors need from an analyzed unit */
export interface ObservedUnit {
  index: number;
  speaker: string;
  text: string;
  score: ScoreResult;
  intensity: number;
  drift: readonly DriftEvent[];
}

export const DENSITY_EVENT_LABELS: Record<DensityEventType, string> = {
  'stage-transition': 'Stage transition',
  emotional: 'Emotional drift',
  meta: 'Meta-communicative condensation',
  general: 'General marker condensation',
};

/** Consecutive units whose intensity differs by more than the threshold */
export function detectEmotionalDrift(
  units: readonly ObservedUnit[],
  threshold: number = EMOTIONAL_DRIFT_THRESHOLD
): EmotionalDriftEvent[] {
  const events: EmotionalDriftEvent[] = [];
  for (let i = 1; i < units.length; i++) {
    const from = units[i - 1].intensity;
    const to = units[i].intensity;
    if (Math.abs(to - from) > threshold) {
      events.push({ index: units[i].index, from, to, change: to - from });
    }
  }
  return events;
}

function categoryActivity(score: ScoreResult): CategoryActivity[] {
  const counts = new Map<Category, number>();
  for (const m of score.matches) {
    counts.set(m.category, (counts.get(m.category) ?? 0) + m.occurrences);
  }
  return score.categories
    .filter(category => (counts.get(category) ?? 0) > 0)
    .map(category => ({ category, count: counts.get(category) ?? 0 }));
}

function classify(unit: ObservedUnit, active: readonly CategoryActivity[]): DensityEventType {
  if (active.length > 1) return 'stage-transition';
  if (unit.intensity > 0) return 'emotional';
  if (unit.drift.length > 0) return 'meta';
  return 'general';
}

function listActivity(active: readonly CategoryActivity[], limit: number): string {
  return active.slice(0, limit).map(a => `${a.category} (${a.count}x)`).join(', ');
}

function describeEvent(type: DensityEventType, unit: ObservedUnit, hits: number, active: readonly CategoryActivity[]): string {
  switch (type) {
    case 'stage-transition':
      return `Shift between value stages. Active stages: ${listActivity(active, 3)}`;
    case 'emotional':
      return `Emotional intensity ${unit.intensity}/5 alongside ${listActivity(active, 2)}`;
    case 'meta':
      return `Reflexive talk about the dialogue with ${unit.drift.length} drift marker${unit.drift.length === 1 ? '' : 's'}`;
    case 'general':
      return `Semantic condensation with ${hits} simultaneous markers`;
  }
}

/**
 * Units carrying more marker occurrences than the threshold, classified by
 * what else is active in them.
 */
export function detectDensityEvents(
  units: readonly ObservedUnit[],
  threshold: number = DENSITY_THRESHOLD
): DensityEvent[] {
  const events: DensityEvent[] = [];

  for (const unit of units) {
    const hits = unit.score.matches.reduce((n, m) => n + m.occurrences, 0);
    if (hits <= threshold) continue;

    const activeCategories = categoryActivity(unit.score);
    const type = classify(unit, activeCategories);
    events.push({
      eventId: events.length + 1,
      index: unit.index,
      speaker: unit.speaker,
      type,
      hits,
      activeCategories,
      excerpt: unit.text.length > EXCERPT_CHARS ? `${unit.text.slice(0, EXCERPT_CHARS)}...` : unit.text,
      description: describeEvent(type, unit, hits, activeCategories),
    });
  }

  return events;
}

/** Most frequent markers over the session; ties keep first-seen order */
export function topMarkers(units: readonly ObservedUnit[], limit = 10): MarkerActivity[] {
  const totals = new Map<string, MarkerActivity>();
  for (const unit of units) {
    for (const m of unit.score.matches) {
      const key = `${m.category}\u0000${m.polarity}\u0000${m.marker}`;
      const entry = totals.get(key);
      if (entry) {
        entry.hits += m.occurrences;
      } else {
        totals.set(key, { category: m.category, polarity: m.polarity, marker: m.marker, hits: m.occurrences });
      }
    }
  }
  return [...totals.values()].sort((a, b) => b.hits - a.hits).slice(0, limit);
}
