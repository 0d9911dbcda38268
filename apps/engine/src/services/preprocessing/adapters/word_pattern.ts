/**
 * Whole-word, case-insensitive patterns shared by the word masker and the
 * domain classifier. Boundaries are Unicode letter/digit aware, so keywords
 * may start or end with punctuation ("c++", "e-mail").
 */

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build a global pattern matching any of `words` as a whole word.
 * Inner whitespace in a phrase matches any whitespace run.
 *
 * @returns null when no usable word remains after trimming
 */
export function buildWordPattern(words: string[]): RegExp | null {
  const alternatives = [...new Set(words.map(w => w.trim().toLowerCase()).filter(w => w.length > 0))]
    .sort((a, b) => b.length - a.length)
    .map(w => escapeRegExp(w).replace(/\s+/g, "\\s+"));

  if (alternatives.length === 0) return null;

  return new RegExp(`(?<![\\p{L}\\p{N}_])(?:${alternatives.join("|")})(?![\\p{L}\\p{N}_])`, "giu");
}
