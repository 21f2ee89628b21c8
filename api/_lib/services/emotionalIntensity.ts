// api/_lib/services/emotionalIntensity.ts
// Surface-level intensity signal: punctuation, shouting, stretched letters, intensifiers

import { tokenize, words } from '../utils/tokenize';

export const MAX_INTENSITY = 5;

export const INTENSIFIERS: ReadonlySet<string> = new Set([
  'sehr', 'extrem', 'wahnsinnig', 'unglaublich', 'total', 'komplett',
]);

export interface IntensityBreakdown {
  exclamations: number;
  capsWords: number;
  repeatedChars: number;
  intensifiers: number;
  score: number;
}

function isShouted(word: string): boolean {
  return word.length > 2 && /\p{Lu}/u.test(word) && word === word.toUpperCase();
}

export function intensityBreakdown(text: string): IntensityBreakdown {
  const t = (text || '').normalize('NFKC');
  const exclamations = (t.match(/!/g) ?? []).length;
  const capsWords = words(t).filter(isShouted).length;
  const repeatedChars = (t.match(/(.)\1{2,}/gsu) ?? []).length;
  const intensifiers = new Set(tokenize(t).filter(w => INTENSIFIERS.has(w))).size;

  const raw = exclamations + capsWords + repeatedChars + intensifiers;
  return { exclamations, capsWords, repeatedChars, intensifiers, score: Math.min(raw, MAX_INTENSITY) };
}

/** 0..5 */
export function measureIntensity(text: string): number {
  return intensityBreakdown(text).score;
}
