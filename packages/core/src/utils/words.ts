/**
 * Split canonical text into words. Canonical text is single-spaced, but
 * decoder hypotheses may not be.
 */
export function splitWords(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) return [];
  return trimmed.split(/\s+/u);
}

export function joinWords(words: string[]): string {
  return words.join(" ");
}

/**
 * Compare two words. Canonical text is already lower-cased and stripped of
 * punctuation, so plain equality is enough.
 */
export function areWordsSame(word1: string, word2: string): boolean {
  return word1 === word2;
}

/** Byte-order comparison, the order `sort` uses under LC_ALL=C. */
export function compareStrings(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
