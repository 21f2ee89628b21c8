import { describe, expect, it } from 'vitest';

import { ConfigError, type ConfigIssue } from '../api/_lib/errors';
import {
  loadMarkerSet,
  loadMarkerSetFromFile,
  stripInlineComment,
} from '../api/_lib/services/markerLoader';
import { CATEGORIES } from '../api/_lib/types/markerTypes';
import { block, rawConfig } from './helpers/fixtures';

function issuesOf(raw: unknown): ConfigIssue[] {
  try {
    loadMarkerSet(raw);
  } catch (e) {
    if (e instanceof ConfigError) return [...e.issues];
    throw e;
  }
  throw new Error('expected a ConfigError');
}

function taxonomy(categories: Record<string, unknown>): unknown {
  return { Spiral_Dynamics_Enhanced: categories };
}

describe('loadMarkerSet: valid configuration', () => {
  it('keeps category, token and drift order as authored', () => {
    const set = loadMarkerSet(rawConfig());

    expect(set.version).toBe('1.0.0-test');
    expect(set.categories.map(c => c.category)).toEqual(['Beige', 'Rot', 'Gruen']);
    expect(set.categories[0].positive).toEqual({
      category: 'Beige',
      polarity: 'positive',
      weight: 1,
      tokens: ['hunger', 'müde'],
      patterns: ['brauche.*hilfe'],
    });
    expect(set.categories[1].negative.weight).toBe(-0.5);
    expect(set.driftGroups).toEqual([
      { name: 'Transition_Markers', patterns: ['aber.*dann.*merkte.*ich', 'jetzt.*sehe.*ich'] },
      { name: 'Resistance_Markers', patterns: ['das.*kann.*nicht.*sein'] },
    ]);
  });

  it('leaves the input untouched and returns a frozen set', () => {
    const raw = rawConfig();
    const before = structuredClone(raw);

    const set = loadMarkerSet(raw);

    expect(raw).toEqual(before);
    expect(Object.isFrozen(set)).toBe(true);
    expect(Object.isFrozen(set.categories[0].positive.tokens)).toBe(true);
    expect(Object.isFrozen(set.driftGroups[0].patterns)).toBe(true);
  });

  it('normalizes tokens and drops case-insensitive duplicates', () => {
    const raw = rawConfig();
    raw.Spiral_Dynamics_Enhanced.Rot.Positive.tokens = ['Macht', 'macht ', 'MACHT', 'ganz   stark'];

    const set = loadMarkerSet(raw);

    expect(set.categories[1].positive.tokens).toEqual(['Macht', 'ganz stark']);
  });

  it('keeps the case of regex escapes inside tokens', () => {
    const raw = rawConfig();
    raw.Spiral_Dynamics_Enhanced.Rot.Positive.tokens = ['a\\Sb', 'a\\sb', 'A\\Sb'];

    const set = loadMarkerSet(raw);

    expect(set.categories[1].positive.tokens).toEqual(['a\\Sb', 'a\\sb']);
  });

  it('drops duplicate patterns within a block', () => {
    const raw = rawConfig();
    raw.Spiral_Dynamics_Enhanced.Beige.Positive.patterns = ['brauche.*hilfe', 'brauche.*hilfe  # doppelt', 'BRAUCHE.*HILFE', 'hilfe'];

    const set = loadMarkerSet(raw);

    expect(set.categories[0].positive.patterns).toEqual(['brauche.*hilfe', 'hilfe']);
  });

  it('drops duplicate patterns within a drift group', () => {
    const raw = rawConfig();
    raw.Semantic_Drift.Resistance_Markers.push({ patterns: ['das.*kann.*nicht.*sein'] });

    expect(loadMarkerSet(raw).driftGroups[1].patterns).toEqual(['das.*kann.*nicht.*sein']);
  });

  it('strips trailing comments from patterns', () => {
    const raw = rawConfig();
    raw.Spiral_Dynamics_Enhanced.Rot.Positive.patterns = ['ich.*ich.*ich  # Häufung von Ich-Referenzen'];

    const set = loadMarkerSet(raw);

    expect(set.categories[1].positive.patterns).toEqual(['ich.*ich.*ich']);
  });

  it('flattens several drift entries of one group into a single list', () => {
    const raw = {
      Spiral_Dynamics_Enhanced: { Beige: { Positive: block(1), Negative: block(-1) } },
      Semantic_Drift: {
        Shift: [{ patterns: ['erst.*dann'] }, { patterns: ['nun.*anders', 'plötzlich'] }],
      },
    };

    expect(loadMarkerSet(raw).driftGroups).toEqual([
      { name: 'Shift', patterns: ['erst.*dann', 'nun.*anders', 'plötzlich'] },
    ]);
  });

  it('treats a missing drift section as no drift groups', () => {
    const set = loadMarkerSet(taxonomy({ Blau: { Positive: block(1, ['ordnung']), Negative: block(-1) } }));
    expect(set.driftGroups).toEqual([]);
    expect(set.version).toBeUndefined();
  });
});

describe('loadMarkerSet: invalid configuration', () => {
  it('reports a missing weight with its path', () => {
    const issues = issuesOf(taxonomy({
      Rot: { Positive: { tokens: ['macht'], patterns: [] }, Negative: block(-0.5) },
    }));
    expect(issues).toEqual([
      { path: 'Spiral_Dynamics_Enhanced.Rot.Positive.weight', message: 'weight is required' },
    ]);
  });

  it('rejects a non-numeric weight', () => {
    const issues = issuesOf(taxonomy({
      Rot: { Positive: { weight: '1.0', tokens: [], patterns: [] }, Negative: block(-0.5) },
    }));
    expect(issues).toEqual([
      { path: 'Spiral_Dynamics_Enhanced.Rot.Positive.weight', message: 'weight must be numeric' },
    ]);
  });

  it('rejects a token list that is not a list', () => {
    const issues = issuesOf(taxonomy({
      Beige: { Positive: { weight: 1, tokens: 'hunger', patterns: [] }, Negative: block(-0.8) },
    }));
    expect(issues).toEqual([
      { path: 'Spiral_Dynamics_Enhanced.Beige.Positive.tokens', message: 'tokens must be a list of strings' },
    ]);
  });

  it('requires both polarity blocks', () => {
    const issues = issuesOf(taxonomy({ Beige: { Positive: block(1) } }));
    expect(issues).toEqual([
      { path: 'Spiral_Dynamics_Enhanced.Beige.Negative', message: 'Negative block is required' },
    ]);
  });

  it('requires the taxonomy section', () => {
    expect(issuesOf({ Semantic_Drift: {} })).toEqual([
      { path: 'Spiral_Dynamics_Enhanced', message: 'Spiral_Dynamics_Enhanced section is required' },
    ]);
  });

  it('rejects unknown category names', () => {
    const issues = issuesOf(taxonomy({
      Beige: { Positive: block(1), Negative: block(-1) },
      Lila: { Positive: block(1), Negative: block(-1) },
    }));
    expect(issues).toHaveLength(1);
    expect(issues[0].path).toBe('Spiral_Dynamics_Enhanced.Lila');
    expect(issues[0].message).toBe(`unknown category (expected one of ${CATEGORIES.join(', ')})`);
  });

  it('requires at least one category', () => {
    expect(issuesOf(taxonomy({}))).toEqual([
      { path: 'Spiral_Dynamics_Enhanced', message: 'at least one category is required' },
    ]);
  });

  it('flags blank tokens and comment-only patterns', () => {
    const issues = issuesOf(taxonomy({
      Gelb: { Positive: block(1, ['   '], ['  # nur ein Kommentar']), Negative: block(-1) },
    }));
    expect(issues).toEqual([
      { path: 'Spiral_Dynamics_Enhanced.Gelb.Positive.tokens.0', message: 'token is blank' },
      { path: 'Spiral_Dynamics_Enhanced.Gelb.Positive.patterns.0', message: 'pattern is empty once its comment is removed' },
    ]);
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => loadMarkerSet('Beige: hunger')).toThrow(ConfigError);
  });
});

describe('stripInlineComment', () => {
  it('removes a comment introduced by whitespace and a hash', () => {
    expect(stripInlineComment('aber.*dann.*merkte.*ich       # Wendepunkt')).toBe('aber.*dann.*merkte.*ich');
  });

  it('keeps a hash that is part of the pattern', () => {
    expect(stripInlineComment('c#')).toBe('c#');
    expect(stripInlineComment('#hashtag')).toBe('#hashtag');
  });
});

describe('loadMarkerSetFromFile', () => {
  it('loads the bundled taxonomy with all nine stages in order', () => {
    const set = loadMarkerSetFromFile();
    expect(set.categories.map(c => c.category)).toEqual([...CATEGORIES]);
    expect(set.driftGroups.map(g => g.name)).toEqual(['Transition_Markers', 'Resistance_Markers']);
    expect(set.driftGroups[0].patterns[2]).toBe('aber.*dann.*merkte.*ich');
  });

  it('wraps a missing file in a ConfigError', () => {
    expect(() => loadMarkerSetFromFile('/nonexistent/markers.json')).toThrow(/^Cannot read marker file/);
  });
});
