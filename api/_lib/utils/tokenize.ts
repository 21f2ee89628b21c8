/**
 * Shared text normalization and word splitting for marker scanning and
 * intensity measurement, so offsets and words line up across services.
 */

/**
 * NFKC-normalizes input so composed and decomposed umlauts compare equal
 * @param text - Raw input
 * @param maxChars - Hard cap applied after normalization
 */
export function normalizeText(text: string, maxChars: number = Infinity): { text: string; truncated: boolean } {
  const normalized = (text || '').normalize('NFKC');
  if (normalized.length <= maxChars) return { text: normalized, truncated: false };
  return { text: normalized.slice(0, maxChars), truncated: true };
}

/**
 * Unicode-aware tokenization keeping original case
 * @returns Words made of letters, digits, apostrophes or hyphens
 */
export function words(text: string): string[] {
  return text.normalize('NFKC').match(/[\p{L}\p{N}][\p{L}\p{N}'’-]*/gu) ?? [];
}

/**
 * Lowercased word list, the form used for dictionary lookups
 */
export function tokenize(text: string): string[] {
  return words(text).map(w => w.toLowerCase());
}
