// api/_lib/services/transcriptAnalysis.ts
import { engineDefaults } from '../env';
import { timeOperation, withModule } from '../logger';
import { AnalysisCancelledError } from '../errors';
import { loadMarkerSet } from './markerLoader';
import { compile, type CompileOptions } from './patternCompiler';
import { score, type ScoreOptions } from './textScorer';
import { detectDrift, detectDriftInUnit } from './driftDetector';
import { aggregate } from './sessionAggregator';
import { measureIntensity } from './emotionalIntensity';
import { detectDensityEvents, detectEmotionalDrift } from './sessionEvents';
import type {
  CompiledMarkerSet,
  DensityEvent,
  DriftEvent,
  EmotionalDriftEvent,
  MarkerSet,
  ScoreResult,
  SessionProfile,
  TranscriptUnit,
} from '../types/markerTypes';

const log = withModule('transcriptAnalysis');

export interface AnalyzeOptions extends ScoreOptions {
  signal?: AbortSignal;
  transitionMinScore?: number;
}

export interface AnalyzedUnit {
  /** 1-based */
  index: number;
  line: number;
  speaker: string;
  text: string;
  timestamp: string | null;
  score: ScoreResult;
  intensity: number;
  drift: DriftEvent[];
}

export interface TranscriptAnalysis {
  units: AnalyzedUnit[];
  driftEvents: DriftEvent[];
  emotionalDrift: EmotionalDriftEvent[];
  densityEvents: DensityEvent[];
  profile: SessionProfile;
}

function toUnits(input: readonly TranscriptUnit[] | readonly string[]): TranscriptUnit[] {
  const list: ReadonlyArray<TranscriptUnit | string> = input;
  return list.map((u, i) =>
    typeof u === 'string' ? { line: i + 1, speaker: 'Unknown', text: u, timestamp: null } : u
  );
}

/**
 * Scores every unit, measures intensity, collects drift and unit events, then aggregates.
 * Per-unit work is independent; results are ordered by index before
 * aggregation, never by completion order.
 */
export function analyzeTranscript(
  input: readonly TranscriptUnit[] | readonly string[],
  cms: CompiledMarkerSet,
  options: AnalyzeOptions = {}
): TranscriptAnalysis {
  const units = toUnits(input);

  return timeOperation(log, 'transcript analysis', () => {
    const analyzed: AnalyzedUnit[] = [];

    units.forEach((unit, i) => {
      if (options.signal?.aborted) {
        throw new AnalysisCancelledError(i, options.signal.reason);
      }
      analyzed.push({
        index: i + 1,
        line: unit.line,
        speaker: unit.speaker,
        text: unit.text,
        timestamp: unit.timestamp,
        score: score(unit.text, cms, options),
        intensity: measureIntensity(unit.text),
        drift: detectDriftInUnit(unit.text, i + 1, cms.driftGroups, options.maxInputChars),
      });
    });

    analyzed.sort((a, b) => a.index - b.index);
    const driftEvents = analyzed.flatMap(u => u.drift);
    const profile = aggregate(analyzed.map(u => u.score), driftEvents, {
      signal: options.signal,
      transitionMinScore: options.transitionMinScore,
    });

    return {
      units: analyzed,
      driftEvents,
      emotionalDrift: detectEmotionalDrift(analyzed),
      densityEvents: detectDensityEvents(analyzed),
      profile,
    };
  }, { units: units.length });
}

export interface MarkerEngineOptions {
  compileMode?: CompileOptions['mode'];
  scoringMode?: ScoreOptions['mode'];
  maxInputChars?: number;
  transitionMinScore?: number;
}

export interface MarkerEngine {
  markerSet: MarkerSet;
  compiled: CompiledMarkerSet;
  score(text: string, options?: ScoreOptions): ScoreResult;
  detectDrift(texts: readonly string[], options?: { signal?: AbortSignal }): DriftEvent[];
  aggregate(scores: readonly ScoreResult[], driftEvents: readonly DriftEvent[], options?: { signal?: AbortSignal }): SessionProfile;
  analyze(input: readonly TranscriptUnit[] | readonly string[], options?: AnalyzeOptions): TranscriptAnalysis;
}

function isMarkerSet(value: unknown): value is MarkerSet {
  return typeof value === 'object' && value !== null
    && Array.isArray(Reflect.get(value, 'categories'))
    && Array.isArray(Reflect.get(value, 'driftGroups'));
}

/**
 * Loads (when given raw config) and compiles once, then hands out operations
 * bound to the compiled artifacts. Each engine is independent of every other.
 */
export function createMarkerEngine(source: unknown, options: MarkerEngineOptions = {}): MarkerEngine {
  const markerSet = isMarkerSet(source) ? source : loadMarkerSet(source);
  const compiled = compile(markerSet, { mode: options.compileMode });
  const scoreDefaults: ScoreOptions = {
    mode: options.scoringMode ?? engineDefaults.scoringMode,
    maxInputChars: options.maxInputChars ?? engineDefaults.maxInputChars,
  };

  return {
    markerSet,
    compiled,
    score: (text, o) => score(text, compiled, { ...scoreDefaults, ...o }),
    detectDrift: (texts, o) => detectDrift(texts, compiled.driftGroups, { ...o, maxInputChars: scoreDefaults.maxInputChars }),
    aggregate: (scores, driftEvents, o) => aggregate(scores, driftEvents, {
      ...o,
      transitionMinScore: options.transitionMinScore,
    }),
    analyze: (input, o) => analyzeTranscript(input, compiled, {
      ...scoreDefaults,
      transitionMinScore: options.transitionMinScore,
      ...o,
    }),
  };
}
