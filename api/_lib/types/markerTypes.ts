// api/_lib/types/markerTypes.ts
// TypeScript interfaces for the marker taxonomy and everything derived from it

// === Taxonomy ===
export const CATEGORIES = [
  'Beige',
  'Purpur',
  'Rot',
  'Blau',
  'Orange',
  'Gruen',
  'Gelb',
  'Tuerkis',
  'Koralle',
] as const;

export type Category = typeof CATEGORIES[number];

export type Polarity = 'positive' | 'negative';

export type MarkerKind = 'token' | 'pattern';

export function isCategory(name: string): name is Category {
  return CATEGORIES.some(c => c === name);
}

export interface PolarityBlock {
  category: Category;
  polarity: Polarity;
  weight: number;
  tokens: readonly string[];
  patterns: readonly string[];
}

export interface CategoryMarkers {
  category: Category;
  positive: PolarityBlock;
  negative: PolarityBlock;
}

export interface MarkerGroup {
  name: string;
  patterns: readonly string[];
}

/** Validated, deep-frozen taxonomy. Category order is source order. */
export interface MarkerSet {
  version?: string;
  categories: readonly CategoryMarkers[];
  driftGroups: readonly MarkerGroup[];
}

// === Compiled artifacts ===
export interface CompiledMarker {
  kind: MarkerKind;
  source: string;
  // Built once with flags `giu`; only read through String.prototype.matchAll
  regex: RegExp;
}

export interface CompiledPolarityBlock {
  category: Category;
  polarity: Polarity;
  weight: number;
  markers: readonly CompiledMarker[];
}

export interface CompiledCategory {
  category: Category;
  positive: CompiledPolarityBlock;
  negative: CompiledPolarityBlock;
}

export interface CompiledMarkerGroup {
  name: string;
  patterns: readonly CompiledMarker[];
}

export type CompiledMarkerGroups = readonly CompiledMarkerGroup[];

export interface CompiledMarkerSet {
  categories: readonly CompiledCategory[];
  driftGroups: CompiledMarkerGroups;
}

export type CompileMode = 'collect-all' | 'fail-fast';

// === Scan results ===
export type ScoringMode = 'presence' | 'frequency';

export type CategoryScores = Readonly<Partial<Record<Category, number>>>;

export interface MatchEvent {
  category: Category;
  polarity: Polarity;
  kind: MarkerKind;
  marker: string;
  match: string;
  offset: number;
  occurrences: number;
  contribution: number;
}

export interface ScoreResult {
  mode: ScoringMode;
  categories: readonly Category[];
  scores: CategoryScores;
  matches: readonly MatchEvent[];
  truncated: boolean;
}

export interface DriftEvent {
  /** 1-based position of the text unit in the transcript */
  index: number;
  group: string;
  pattern: string;
  patternIndex: number;
  match: string;
  offset: number;
}

// === Session ===
export type Trend = 'rising' | 'falling' | 'stable';

export interface CategoryAggregate {
  category: Category;
  mean: number;
  total: number;
  min: number;
  max: number;
  slope: number;
  trend: Trend;
}

export interface StageTransition {
  /** 1-based unit index at which the new stage became dominant */
  index: number;
  from: Category;
  to: Category;
  score: number;
  meaning: string;
}

export interface SessionProfile {
  unitCount: number;
  policy: 'mean';
  categories: readonly CategoryAggregate[];
  aggregate: CategoryScores;
  dominant: Category;
  dominantScore: number;
  confidence: number;
  transitions: readonly StageTransition[];
  driftEvents: readonly DriftEvent[];
  driftSummary: Readonly<Record<string, number>>;
}

export interface EmotionalDriftEvent {
  /** 1-based index of the later unit */
  index: number;
  from: number;
  to: number;
  change: number;
}

export type DensityEventType = 'stage-transition' | 'emotional' | 'meta' | 'general';

export interface CategoryActivity {
  category: Category;
  count: number;
}

export interface DensityEvent {
  eventId: number;
  index: number;
  speaker: string;
  type: DensityEventType;
  /** Marker occurrences in the unit */
  hits: number;
  activeCategories: readonly CategoryActivity[];
  excerpt: string;
  description: string;
}

export interface MarkerActivity {
  category: Category;
  polarity: Polarity;
  marker: string;
  hits: number;
}

// === Transcripts ===
export interface TranscriptUnit {
  line: number;
  speaker: string;
  text: string;
  timestamp: string | null;
}
