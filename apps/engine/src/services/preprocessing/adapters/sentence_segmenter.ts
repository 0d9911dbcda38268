/**
 * PunctuationSentenceSegmenter - Splits on terminal punctuation
 *
 * Boundaries are normalized before splitting: whitespace collapsed, no space
 * before punctuation, and a run of terminal marks reduced to one.
 * Abbreviations such as "Mr." are split like any other sentence end.
 */

import type { SentenceSegmenter } from "./types.js";
import { collapseWhitespace } from "./text_normalizer.js";

export class PunctuationSentenceSegmenter implements SentenceSegmenter {
  segment(text: string): string[] {
    const standardized = standardizeBoundaries(text);
    if (standardized.length === 0) return [];

    return standardized
      .split(/(?<=[.!?])\s+/)
      .map(sentence => sentence.trim())
      .filter(sentence => sentence.length > 0);
  }
}

/**
 * "Really ?!?  Yes..." -> "Really? Yes."
 */
export function standardizeBoundaries(text: string): string {
  return collapseWhitespace(text)
    .replace(/\s+([.,;:!?])/g, "$1")
    .replace(/[.!?]{2,}/g, run => (run.includes("?") ? "?" : run.includes("!") ? "!" : "."));
}
