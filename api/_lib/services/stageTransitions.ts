// api/_lib/services/stageTransitions.ts
// Shifts of the dominant value stage between consecutive text units

import type { Category, ScoreResult, StageTransition } from '../types/markerTypes';

// Readable descriptions for the UI and reports
export const STAGE_DESCRIPTIONS: Record<Category, string> = {
  Beige: 'Basic needs & survival',
  Purpur: 'Tribal belonging & ritual',
  Rot: 'Ego assertion & dominance',
  Blau: 'Order & traditional structure',
  Orange: 'Achievement & performance',
  Gruen: 'Community & empathy',
  Gelb: 'Systemic thinking & flexibility',
  Tuerkis: 'Holistic connectedness',
  Koralle: 'Unity & transcendence',
};

const TRANSITION_MEANINGS: Partial<Record<`${Category}->${Category}`, string>> = {
  'Beige->Purpur': 'From survival mode to social bonding',
  'Purpur->Rot': 'From group loyalty to individual power',
  'Rot->Blau': 'From chaos to order and structure',
  'Blau->Orange': 'From rigid rules to strategic thinking',
  'Orange->Gruen': 'From performance to interpersonal harmony',
  'Gruen->Gelb': 'From emotional to systemic perspective',
  'Gelb->Tuerkis': 'From analytical to holistic awareness',
  'Tuerkis->Koralle': 'From holistic awareness to unity consciousness',
};

export function transitionMeaning(from: Category, to: Category): string {
  return TRANSITION_MEANINGS[`${from}->${to}`]
    ?? `Value shift from ${STAGE_DESCRIPTIONS[from]} to ${STAGE_DESCRIPTIONS[to]}`;
}

/**
 * Highest-scoring category of one unit, earliest declared on ties.
 * Null when nothing scored above zero.
 */
export function dominantOf(result: ScoreResult): { category: Category; score: number } | null {
  let best: { category: Category; score: number } | null = null;
  for (const category of result.categories) {
    const s = result.scores[category] ?? 0;
    if (s > 0 && (best === null || s > best.score)) best = { category, score: s };
  }
  return best;
}

export function detectStageTransitions(
  scores: readonly ScoreResult[],
  options: { minScore?: number } = {}
): StageTransition[] {
  const minScore = options.minScore ?? 1;
  const transitions: StageTransition[] = [];
  let previous: Category | null = null;

  scores.forEach((result, i) => {
    const current = dominantOf(result);
    if (!current) return;

    if (previous !== null && current.category !== previous && current.score > minScore) {
      transitions.push({
        index: i + 1,
        from: previous,
        to: current.category,
        score: current.score,
        meaning: transitionMeaning(previous, current.category),
      });
    }
    // A weak reading does not displace the established stage
    if (previous === null || current.score > minScore) previous = current.category;
  });

  return transitions;
}
