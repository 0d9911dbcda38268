/**
 * Text primitive adapters - capability interfaces and default implementations
 */

import type { TextPrimitives } from "./types.js";
import type { TiktokenEncoding } from "js-tiktoken";
import { BpeTokenizer } from "./bpe_tokenizer.js";
import { UnicodeTextNormalizer } from "./text_normalizer.js";
import { HtmlStripper, UrlStripper } from "./markup_stripper.js";
import { PiiMasker } from "./pii_masker.js";
import { OffensiveWordMasker } from "./offensive_masker.js";
import { PunctuationSentenceSegmenter } from "./sentence_segmenter.js";

export type {
  TokenSpan,
  Tokenizer,
  TextMasker,
  TextStripper,
  TextNormalizer,
  SentenceSegmenter,
  TextPrimitives,
} from "./types.js";

export { BpeTokenizer, DEFAULT_ENCODING } from "./bpe_tokenizer.js";
export { WhitespaceTokenizer } from "./whitespace_tokenizer.js";
export { UnicodeTextNormalizer, collapseWhitespace } from "./text_normalizer.js";
export { UrlStripper, HtmlStripper } from "./markup_stripper.js";
export { PiiMasker, DEFAULT_PII_RULES, type MaskingRule } from "./pii_masker.js";
export { OffensiveWordMasker, loadDefaultOffensiveWords } from "./offensive_masker.js";
export { buildWordPattern, escapeRegExp } from "./word_pattern.js";
export { PunctuationSentenceSegmenter, standardizeBoundaries } from "./sentence_segmenter.js";

export interface DefaultPrimitivesOptions {
  /** tiktoken encoding for token counts (default: cl100k_base) */
  encoding?: TiktokenEncoding;
  /** Replacement for removed URLs (default: "") */
  urlReplacement?: string;
  /** Replaces the bundled offensive word list */
  offensiveWords?: string[];
}

/**
 * Build the default primitive bundle, optionally overriding single capabilities
 */
export function createDefaultPrimitives(
  options: DefaultPrimitivesOptions = {},
  overrides: Partial<TextPrimitives> = {}
): TextPrimitives {
  return {
    tokenizer: new BpeTokenizer(options.encoding),
    normalizer: new UnicodeTextNormalizer(),
    urlStripper: new UrlStripper(options.urlReplacement ?? ""),
    htmlStripper: new HtmlStripper(),
    piiMasker: new PiiMasker(),
    offensiveMasker: new OffensiveWordMasker(options.offensiveWords),
    segmenter: new PunctuationSentenceSegmenter(),
    ...overrides,
  };
}
