import { describe, expect, it } from 'vitest';

import { detectDriftInUnit } from '../api/_lib/services/driftDetector';
import { loadMarkerSet, loadMarkerSetFromFile } from '../api/_lib/services/markerLoader';
import { compile } from '../api/_lib/services/patternCompiler';
import { score, scoreOf } from '../api/_lib/services/textScorer';
import { rawConfig, testCompiled } from './helpers/fixtures';

describe('score', () => {
  const cms = testCompiled();

  it('adds the block weight once per firing marker', () => {
    const result = score('Ich habe Hunger und bin müde', cms);
    expect(result.scores).toEqual({ Beige: 2, Rot: 0, Gruen: 0 });
    expect(result.categories).toEqual(['Beige', 'Rot', 'Gruen']);
    expect(result.mode).toBe('presence');
  });

  it('records where and how a pattern fired', () => {
    const result = score('Ich brauche dringend Hilfe', cms);
    expect(result.matches).toEqual([{
      category: 'Beige',
      polarity: 'positive',
      kind: 'pattern',
      marker: 'brauche.*hilfe',
      match: 'brauche dringend Hilfe',
      offset: 4,
      occurrences: 1,
      contribution: 1,
    }]);
  });

  it('nets positive and negative markers of one category', () => {
    const result = score('Hunger aber Luxus', cms);
    expect(result.scores.Beige).toBeCloseTo(0.2, 10);
    expect(result.matches.map(m => [m.polarity, m.marker])).toEqual([
      ['positive', 'hunger'],
      ['negative', 'luxus'],
    ]);
  });

  it('scores negative-only text below zero', () => {
    expect(score('Ich fühle mich schwach', cms).scores).toEqual({ Beige: 0, Rot: -0.5, Gruen: 0 });
  });

  it('lets one text feed several categories', () => {
    expect(score('Gemeinsam sind wir stark', cms).scores).toEqual({ Beige: 0, Rot: 1, Gruen: 1 });
  });

  it('counts repeats only in frequency mode', () => {
    const text = 'Hunger! Hunger? HUNGER.';

    const presence = score(text, cms, { mode: 'presence' });
    const frequency = score(text, cms, { mode: 'frequency' });

    expect(presence.scores.Beige).toBe(1);
    expect(presence.matches[0].occurrences).toBe(1);
    expect(frequency.scores.Beige).toBe(3);
    expect(frequency.matches[0]).toMatchObject({ match: 'Hunger', offset: 0, occurrences: 3, contribution: 3 });
  });

  it('maps every category to zero for empty text', () => {
    const result = score('', cms);
    expect(result.scores).toEqual({ Beige: 0, Rot: 0, Gruen: 0 });
    expect(result.matches).toEqual([]);
    expect(result.truncated).toBe(false);
  });

  it('does not match a token inside a longer word', () => {
    expect(score('Ich bin übermüdet und machtlos', cms).scores).toEqual({ Beige: 0, Rot: 0, Gruen: 0 });
  });

  it('treats decomposed umlauts like composed ones', () => {
    expect(score('so mu\u0308de', cms).scores.Beige).toBe(1);
  });

  it('truncates over-long input before scanning', () => {
    const result = score('Mir ist so langweilig, ich habe Hunger', cms, { maxInputChars: 10 });
    expect(result.truncated).toBe(true);
    expect(result.scores.Beige).toBe(0);
  });

  it('returns identical frozen results for identical input', () => {
    const a = score('Hunger, Macht und Gefühle', cms);
    const b = score('Hunger, Macht und Gefühle', cms);
    expect(a).toEqual(b);
    expect(Object.isFrozen(a.scores)).toBe(true);
    expect(Object.isFrozen(a.matches[0])).toBe(true);
  });
});

describe('score with repeated or escaped markers', () => {
  it('counts a pattern listed twice only once', () => {
    const raw = rawConfig();
    raw.Spiral_Dynamics_Enhanced.Beige.Positive.patterns = ['hilfe', 'hilfe'];

    expect(score('hilfe', compile(loadMarkerSet(raw))).scores.Beige).toBe(1);
  });

  it('matches token escapes as authored', () => {
    const raw = rawConfig();
    raw.Spiral_Dynamics_Enhanced.Rot.Positive.tokens = ['a\\Sb'];
    const cms = compile(loadMarkerSet(raw));

    expect(score('axb', cms).scores.Rot).toBe(1);
    expect(score('a b', cms).scores.Rot).toBe(0);
  });
});

describe('scoreOf', () => {
  it('reads undeclared categories as zero', () => {
    const result = score('Hunger', testCompiled());
    expect(scoreOf(result, 'Beige')).toBe(1);
    expect(scoreOf(result, 'Koralle')).toBe(0);
  });
});

describe('score with the bundled taxonomy', () => {
  it('places a plea for help at the survival stage only', () => {
    const cms = compile(loadMarkerSetFromFile());
    const result = score('ich brauche dringend hilfe', cms);

    expect(result.scores).toEqual({
      Beige: 1,
      Purpur: 0,
      Rot: 0,
      Blau: 0,
      Orange: 0,
      Gruen: 0,
      Gelb: 0,
      Tuerkis: 0,
      Koralle: 0,
    });
    expect(result.matches.map(m => m.marker)).toEqual(['ich brauche.*hilfe']);
  });

  it('scans near-miss gapped input of maximum length in bounded time', () => {
    const cms = compile(loadMarkerSetFromFile());

    for (const text of ['nichts hat '.repeat(1818), 'jetzt sehe ich das '.repeat(1052)]) {
      const started = performance.now();
      const result = score(text, cms);
      const drift = detectDriftInUnit(text, 1, cms.driftGroups);

      expect(performance.now() - started).toBeLessThan(1000);
      expect(result.truncated).toBe(false);
      expect(drift.some(e => e.pattern === 'jetzt.*sehe.*ich.*das.*anders')).toBe(false);
    }
  });
});
