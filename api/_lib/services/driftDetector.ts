// api/_lib/services/driftDetector.ts
import { withModule } from '../logger';
import { AnalysisCancelledError } from '../errors';
import { deepFreeze } from '../utils/freeze';
import { normalizeText } from '../utils/tokenize';
import { engineDefaults } from '../env';
import { findMatches } from './patternCompiler';
import type { CompiledMarkerGroups, DriftEvent } from '../types/markerTypes';

const log = withModule('driftDetector');

export interface DetectDriftOptions {
  signal?: AbortSignal;
  maxInputChars?: number;
}

/**
 * Drift events for one text unit at 1-based transcript position `index`,
 * in group then pattern declaration order.
 */
export function detectDriftInUnit(text: string, index: number, groups: CompiledMarkerGroups, maxInputChars?: number): DriftEvent[] {
  const { text: t } = normalizeText(text, maxInputChars ?? engineDefaults.maxInputChars);
  const events: DriftEvent[] = [];
  if (!t) return events;

  for (const group of groups) {
    group.patterns.forEach((pattern, patternIndex) => {
      const [m] = findMatches(pattern, t, 1);
      if (!m) return;
      events.push({
        index,
        group: group.name,
        pattern: pattern.source,
        patternIndex,
        match: m[0],
        offset: m.index ?? 0,
      });
    });
  }
  return events;
}

/**
 * Scans a transcript for transition and resistance markers. Identical input
 * always yields the same ordered events; nothing is deduplicated across units.
 */
export function detectDrift(
  texts: readonly string[],
  groups: CompiledMarkerGroups,
  options: DetectDriftOptions = {}
): DriftEvent[] {
  const events: DriftEvent[] = [];

  texts.forEach((text, i) => {
    if (options.signal?.aborted) {
      throw new AnalysisCancelledError(i, options.signal.reason);
    }
    events.push(...detectDriftInUnit(text, i + 1, groups, options.maxInputChars));
  });

  if (events.length > 0) {
    log.info('Drift markers detected', { units: texts.length, events: events.length });
  }
  return deepFreeze(events);
}
