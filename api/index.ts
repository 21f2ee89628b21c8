// api/index.ts - Engine-facing API surface

export { loadMarkerSet, loadMarkerSetFromFile, resolveMarkersPath, stripInlineComment } from './_lib/services/markerLoader';
export { compile, compileDriftGroups, type CompileOptions } from './_lib/services/patternCompiler';
export { score, scoreOf, type ScoreOptions } from './_lib/services/textScorer';
export { detectDrift, type DetectDriftOptions } from './_lib/services/driftDetector';
export { aggregate, type AggregateOptions } from './_lib/services/sessionAggregator';
export { detectStageTransitions, dominantOf, STAGE_DESCRIPTIONS } from './_lib/services/stageTransitions';
export { measureIntensity, intensityBreakdown } from './_lib/services/emotionalIntensity';
export { detectEmotionalDrift, detectDensityEvents, topMarkers, type ObservedUnit } from './_lib/services/sessionEvents';
export { parseTranscript, parseTranscriptWithFormat, normalizeSpeaker, type TranscriptFormat } from './_lib/services/transcriptParser';
export {
  analyzeTranscript,
  createMarkerEngine,
  type AnalyzeOptions,
  type AnalyzedUnit,
  type MarkerEngine,
  type MarkerEngineOptions,
  type TranscriptAnalysis,
} from './_lib/services/transcriptAnalysis';
export { formatReport, type ReportOptions } from './_lib/services/report';
export {
  AppError,
  ConfigError,
  PatternCompileError,
  EmptyTranscriptError,
  AnalysisCancelledError,
  type ConfigIssue,
  type PatternFailure,
} from './_lib/errors';
export type { RawMarkerConfig } from './_lib/schemas/markerConfig';
export * from './_lib/types/markerTypes';
