/**
 * Text primitive capabilities consumed by the rule engine.
 *
 * The engine only depends on these contracts. Default implementations live
 * next to this file; callers may swap any of them (e.g. a model tokenizer).
 */

export interface TokenSpan {
  /** Token text as it appears in the source, separators included */
  token: string;
  /** Character offset of the first character (inclusive) */
  start: number;
  /** Character offset after the last character (exclusive) */
  end: number;
}

export interface Tokenizer {
  /** Ordered token spans over `text` */
  tokenize(text: string): TokenSpan[];
  count(text: string): number;
}

export interface TextMasker {
  mask(text: string): string;
}

export interface TextStripper {
  strip(text: string): string;
}

export interface TextNormalizer {
  normalize(text: string): string;
}

export interface SentenceSegmenter {
  segment(text: string): string[];
}

/**
 * Everything the default rule set needs, bundled.
 */
export interface TextPrimitives {
  tokenizer: Tokenizer;
  normalizer: TextNormalizer;
  urlStripper: TextStripper;
  htmlStripper: TextStripper;
  piiMasker: TextMasker;
  offensiveMasker: TextMasker;
  segmenter: SentenceSegmenter;
}
