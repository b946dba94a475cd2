export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Alternation of literal words, longest first. */
export function wordAlternation(words: readonly string[]): string {
  return [...words]
    .filter((word) => word.length > 0)
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

/** Start-of-word boundary that also holds for non-ASCII letters. */
export const WORD_START = '(?<![\\p{L}\\p{N}])';
