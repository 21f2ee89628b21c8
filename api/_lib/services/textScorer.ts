// api/_lib/services/textScorer.ts
// Scores one text unit against every category of a compiled marker set

import { engineDefaults } from '../env';
import { withModule } from '../logger';
import { deepFreeze } from '../utils/freeze';
import { normalizeText } from '../utils/tokenize';
import { findMatches } from './patternCompiler';
import type {
  Category,
  CompiledMarkerSet,
  CompiledPolarityBlock,
  MatchEvent,
  ScoreResult,
  ScoringMode,
} from '../types/markerTypes';

const log = withModule('textScorer');

export interface ScoreOptions {
  /** presence (default): each firing marker counts once; frequency: once per occurrence */
  mode?: ScoringMode;
  maxInputChars?: number;
}

function scanBlock(block: CompiledPolarityBlock, text: string, mode: ScoringMode, events: MatchEvent[]): number {
  let sum = 0;
  const limit = mode === 'presence' ? 1 : Infinity;

  for (const marker of block.markers) {
    const found = findMatches(marker, text, limit);
    if (found.length === 0) continue;

    const [first] = found;
    const contribution = block.weight * found.length;
    sum += contribution;
    events.push({
      category: block.category,
      polarity: block.polarity,
      kind: marker.kind,
      marker: marker.source,
      match: first[0],
      offset: first.index ?? 0,
      occurrences: found.length,
      contribution,
    });
  }

  return sum;
}

/**
 * Pure function of (text, compiled set, options). Offsets refer to the
 * NFKC-normalized, possibly truncated text.
 */
export function score(text: string, cms: CompiledMarkerSet, options: ScoreOptions = {}): ScoreResult {
  const mode = options.mode ?? engineDefaults.scoringMode;
  const maxInputChars = options.maxInputChars ?? engineDefaults.maxInputChars;
  const { text: t, truncated } = normalizeText(text, maxInputChars);

  if (truncated) {
    log.warn('Input text truncated before scoring', { length: text.length, maxInputChars });
  }

  const categories: Category[] = [];
  const scores: Partial<Record<Category, number>> = {};
  const matches: MatchEvent[] = [];

  for (const c of cms.categories) {
    categories.push(c.category);
    if (!t) {
      scores[c.category] = 0;
      continue;
    }
    scores[c.category] = scanBlock(c.positive, t, mode, matches) + scanBlock(c.negative, t, mode, matches);
  }

  if (matches.length > 0) {
    log.debug('Text scored', { length: t.length, matchCount: matches.length, mode });
  }

  return deepFreeze({ mode, categories, scores, matches, truncated });
}

/** Score lookup that treats an undeclared category as 0 */
export function scoreOf(result: ScoreResult, category: Category): number {
  return result.scores[category] ?? 0;
}
