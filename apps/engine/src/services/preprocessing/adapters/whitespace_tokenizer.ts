/**
 * WhitespaceTokenizer - Word-level tokenizer with tiling spans
 *
 * One token per run of non-whitespace characters. Each span starts at the
 * whitespace preceding its word (the way BPE tokenizers attach a leading
 * space), and the last span absorbs trailing whitespace, so the spans cover
 * the whole text with no gaps.
 *
 * Counts words, not model tokens. The default is BpeTokenizer; pass this one
 * explicitly where a model tokenizer is not wanted.
 */

import type { Tokenizer, TokenSpan } from "./types.js";

const TOKEN_PATTERN = /\s*\S+/g;

export class WhitespaceTokenizer implements Tokenizer {
  tokenize(text: string): TokenSpan[] {
    const spans: TokenSpan[] = [];

    for (const match of text.matchAll(TOKEN_PATTERN)) {
      const start = match.index ?? 0;
      spans.push({ token: match[0], start, end: start + match[0].length });
    }

    const last = spans[spans.length - 1];
    if (last && last.end < text.length) {
      spans[spans.length - 1] = {
        token: text.slice(last.start),
        start: last.start,
        end: text.length,
      };
    }

    return spans;
  }

  count(text: string): number {
    return text.match(TOKEN_PATTERN)?.length ?? 0;
  }
}
