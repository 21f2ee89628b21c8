// Small hand-made taxonomies for unit tests
import { loadMarkerSet } from '../../api/_lib/services/markerLoader';
import { compile } from '../../api/_lib/services/patternCompiler';
import type { CompiledMarkerSet, MarkerSet } from '../../api/_lib/types/markerTypes';

export interface RawBlock {
  weight: unknown;
  tokens: unknown;
  patterns: unknown;
}

export function block(weight: number, tokens: string[] = [], patterns: string[] = []): RawBlock {
  return { weight, tokens, patterns };
}

export function category(positive: RawBlock, negative: RawBlock = block(-0.8)) {
  return { Positive: positive, Negative: negative };
}

export function rawConfig() {
  return {
    version: '1.0.0-test',
    Spiral_Dynamics_Enhanced: {
      Beige: category(
        block(1.0, ['hunger', 'müde'], ['brauche.*hilfe']),
        block(-0.8, ['luxus'])
      ),
      Rot: category(
        block(1.0, ['macht', 'stark']),
        block(-0.5, ['schwach'])
      ),
      Gruen: category(
        block(1.0, ['gemeinsam', 'gefühle'])
      ),
    },
    Semantic_Drift: {
      Transition_Markers: [
        { patterns: ['aber.*dann.*merkte.*ich', 'jetzt.*sehe.*ich'] },
      ],
      Resistance_Markers: [
        { patterns: ['das.*kann.*nicht.*sein'] },
      ],
    },
  };
}

export function testMarkerSet(): MarkerSet {
  return loadMarkerSet(rawConfig());
}

export function testCompiled(): CompiledMarkerSet {
  return compile(testMarkerSet());
}
