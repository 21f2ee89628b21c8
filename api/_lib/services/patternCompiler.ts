// api/_lib/services/patternCompiler.ts
// Turns every token and pattern of a MarkerSet into a reusable matcher, once.

import { engineDefaults } from '../env';
import { withModule } from '../logger';
import { PatternCompileError, type PatternFailure, type PatternOrigin } from '../errors';
import { boundQuantifiers, findNestedQuantifier } from '../utils/regexSafety';
import { deepFreeze } from '../utils/freeze';
import type {
  CompileMode,
  CompiledCategory,
  CompiledMarker,
  CompiledMarkerGroup,
  CompiledMarkerGroups,
  CompiledMarkerSet,
  CompiledPolarityBlock,
  MarkerGroup,
  MarkerKind,
  MarkerSet,
  PolarityBlock,
} from '../types/markerTypes';

const log = withModule('patternCompiler');

export const MATCH_FLAGS = 'giu';

// Cap for `*`, `+` and `{n,}`: a `.*` gap spans at most this many characters
export const MAX_REPEAT = 100;

// Unicode-aware word edges; \b only knows ASCII and would miss umlauts
const WORD_START = '(?<![\\p{L}\\p{N}_])';
const WORD_END = '(?![\\p{L}\\p{N}_])';

export interface CompileOptions {
  mode?: CompileMode;
}

export function tokenSource(token: string): string {
  return `${WORD_START}(?:${token.replace(/\s+/g, '\\s+')})${WORD_END}`;
}

/**
 * Non-empty matches of a compiled marker, at most `limit` of them.
 * matchAll works on a copy of the regex, so the shared instance keeps no per-scan state.
 */
export function findMatches(marker: CompiledMarker, text: string, limit: number = Infinity): RegExpMatchArray[] {
  const out: RegExpMatchArray[] = [];
  if (limit <= 0) return out;
  for (const m of text.matchAll(marker.regex)) {
    if (m[0].length === 0) continue;
    out.push(m);
    if (out.length >= limit) break;
  }
  return out;
}

class Collector {
  readonly failures: PatternFailure[] = [];

  constructor(private readonly mode: CompileMode) {}

  compileOne(origin: PatternOrigin, kind: MarkerKind, source: string): CompiledMarker | null {
    const failure = (reason: string): null => {
      const f: PatternFailure = { origin, markerKind: kind, pattern: source, reason };
      this.failures.push(f);
      log.warn('Marker failed to compile', { ...origin, markerKind: kind, pattern: source, reason });
      if (this.mode === 'fail-fast') throw new PatternCompileError([f]);
      return null;
    };

    const regexSource = boundQuantifiers(kind === 'token' ? tokenSource(source) : source, MAX_REPEAT);

    let regex: RegExp;
    try {
      regex = new RegExp(regexSource, MATCH_FLAGS);
    } catch (error) {
      return failure(error instanceof Error ? error.message : String(error));
    }

    const nested = findNestedQuantifier(source);
    if (nested !== null) {
      return failure(`nested unbounded quantifier at offset ${nested} risks catastrophic backtracking`);
    }

    // A marker that fires on empty input would score every text
    if (new RegExp(regexSource, 'iu').test('')) {
      return failure('matches the empty string');
    }

    return { kind, source, regex };
  }
}

function compileBlock(block: PolarityBlock, collector: Collector): CompiledPolarityBlock {
  const origin: PatternOrigin = { kind: 'category', category: block.category, polarity: block.polarity };
  const markers: CompiledMarker[] = [];

  for (const token of block.tokens) {
    const compiled = collector.compileOne(origin, 'token', token);
    if (compiled) markers.push(compiled);
  }
  for (const pattern of block.patterns) {
    const compiled = collector.compileOne(origin, 'pattern', pattern);
    if (compiled) markers.push(compiled);
  }

  return { category: block.category, polarity: block.polarity, weight: block.weight, markers };
}

function compileGroups(groups: readonly MarkerGroup[], collector: Collector): CompiledMarkerGroup[] {
  return groups.map((group) => {
    const origin: PatternOrigin = { kind: 'drift', group: group.name };
    const patterns: CompiledMarker[] = [];
    for (const pattern of group.patterns) {
      const compiled = collector.compileOne(origin, 'pattern', pattern);
      if (compiled) patterns.push(compiled);
    }
    return { name: group.name, patterns };
  });
}

/**
 * Compiles a MarkerSet. `collect-all` (default) reports every bad marker in a
 * single PatternCompileError; `fail-fast` throws on the first one.
 */
export function compile(markerSet: MarkerSet, options: CompileOptions = {}): CompiledMarkerSet {
  const mode = options.mode ?? engineDefaults.compileMode;
  const collector = new Collector(mode);

  const categories: CompiledCategory[] = markerSet.categories.map((c) => ({
    category: c.category,
    positive: compileBlock(c.positive, collector),
    negative: compileBlock(c.negative, collector),
  }));
  const driftGroups = compileGroups(markerSet.driftGroups, collector);

  if (collector.failures.length > 0) {
    throw new PatternCompileError(collector.failures);
  }

  const markerCount = categories.reduce((n, c) => n + c.positive.markers.length + c.negative.markers.length, 0);
  log.info('Marker set compiled', {
    categories: categories.length,
    markers: markerCount,
    driftPatterns: driftGroups.reduce((n, g) => n + g.patterns.length, 0),
    mode,
  });

  return deepFreeze({ categories, driftGroups });
}

export function compileDriftGroups(groups: readonly MarkerGroup[], options: CompileOptions = {}): CompiledMarkerGroups {
  const collector = new Collector(options.mode ?? engineDefaults.compileMode);
  const compiled = compileGroups(groups, collector);
  if (collector.failures.length > 0) {
    throw new PatternCompileError(collector.failures);
  }
  return deepFreeze(compiled);
}
