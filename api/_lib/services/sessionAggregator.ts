// api/_lib/services/sessionAggregator.ts
// Folds per-unit scores and drift events into one SessionProfile.
//
// Policy: the aggregate score of a category is the arithmetic mean of its
// per-unit scores. Totals are reported alongside but never decide dominance.

import { engineDefaults } from '../env';
import { withModule } from '../logger';
import { AnalysisCancelledError, AppError, EmptyTranscriptError } from '../errors';
import { deepFreeze } from '../utils/freeze';
import { detectStageTransitions } from './stageTransitions';
import type {
  Category,
  CategoryAggregate,
  CategoryScores,
  DriftEvent,
  ScoreResult,
  SessionProfile,
  Trend,
} from '../types/markerTypes';

const log = withModule('sessionAggregator');

const SLOPE_EPSILON = 1e-9;

export interface AggregateOptions {
  signal?: AbortSignal;
  transitionMinScore?: number;
}

// Least-squares slope of y over x = 0..n-1
function slopeOf(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const meanX = (n - 1) / 2;
  const meanY = values.reduce((a, b) => a + b, 0) / n;
  let num = 0;
  let den = 0;
  values.forEach((y, x) => {
    num += (x - meanX) * (y - meanY);
    den += (x - meanX) ** 2;
  });
  return num / den;
}

function trendOf(slope: number): Trend {
  if (slope > SLOPE_EPSILON) return 'rising';
  if (slope < -SLOPE_EPSILON) return 'falling';
  return 'stable';
}

// Declaration order across all results, first appearance wins
function declaredCategories(scores: readonly ScoreResult[]): Category[] {
  const seen = new Set<Category>();
  const order: Category[] = [];
  for (const result of scores) {
    for (const c of result.categories) {
      if (!seen.has(c)) {
        seen.add(c);
        order.push(c);
      }
    }
  }
  return order;
}

export function aggregate(
  scores: readonly ScoreResult[],
  driftEvents: readonly DriftEvent[],
  options: AggregateOptions = {}
): SessionProfile {
  if (scores.length === 0) {
    throw new EmptyTranscriptError();
  }

  const categories = declaredCategories(scores);
  if (categories.length === 0) {
    throw new AppError('Score results declare no categories', 'ERR_NO_CATEGORIES');
  }
  const series = new Map<Category, number[]>(categories.map(c => [c, []]));

  scores.forEach((result, i) => {
    if (options.signal?.aborted) {
      throw new AnalysisCancelledError(i, options.signal.reason);
    }
    for (const c of categories) {
      series.get(c)?.push(result.scores[c] ?? 0);
    }
  });

  const aggregates: CategoryAggregate[] = categories.map((category) => {
    const values = series.get(category) ?? [];
    const total = values.reduce((a, b) => a + b, 0);
    const slope = slopeOf(values);
    return {
      category,
      mean: total / values.length,
      total,
      min: Math.min(...values),
      max: Math.max(...values),
      slope,
      trend: trendOf(slope),
    };
  });

  // Strictly greater keeps the earliest declared category on ties
  let dominant = aggregates[0];
  for (const a of aggregates) {
    if (a.mean > dominant.mean) dominant = a;
  }

  const positiveMass = aggregates.reduce((sum, a) => sum + Math.max(0, a.mean), 0);
  const confidence = dominant.mean > 0 && positiveMass > 0 ? dominant.mean / positiveMass : 0;

  const aggregateScores: Partial<Record<Category, number>> = {};
  for (const a of aggregates) aggregateScores[a.category] = a.mean;

  const driftSummary: Record<string, number> = {};
  for (const e of driftEvents) {
    driftSummary[e.group] = (driftSummary[e.group] ?? 0) + 1;
  }

  const profile: SessionProfile = {
    unitCount: scores.length,
    policy: 'mean',
    categories: aggregates,
    aggregate: aggregateScores satisfies CategoryScores,
    dominant: dominant.category,
    dominantScore: dominant.mean,
    confidence,
    transitions: detectStageTransitions(scores, {
      minScore: options.transitionMinScore ?? engineDefaults.transitionMinScore,
    }),
    driftEvents: driftEvents.map(e => ({ ...e })),
    driftSummary,
  };

  log.info('Session aggregated', {
    units: profile.unitCount,
    dominant: profile.dominant,
    confidence: Number(confidence.toFixed(3)),
    driftEvents: driftEvents.length,
  });

  return deepFreeze(profile);
}
