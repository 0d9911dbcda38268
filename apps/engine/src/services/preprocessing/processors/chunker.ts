/**
 * Chunker - Token-aligned overlapping chunks
 *
 * Purpose: Keep each piece under a model's token limit while repeating
 * `overlap` tokens between neighbours for context.
 *
 * Windows of `tokenLimit` tokens advance by `tokenLimit - overlap`. A chunk's
 * text is the source slice from its first token's start to its last token's
 * end, so chunks are exact substrings. The last window may be short and is
 * emitted once.
 *
 * This component does NOT:
 * - Decide whether chunking is needed (the chunking rule's guard does)
 * - Interpret or clean the text
 */

import type { Chunk } from "../../../schemas/index.js";
import type { Tokenizer, TokenSpan } from "../adapters/types.js";
import { BpeTokenizer } from "../adapters/bpe_tokenizer.js";
import { InvalidChunkConfigError } from "../../errors.js";

export interface ChunkerOptions {
  /** Maximum tokens per chunk */
  tokenLimit: number;
  /** Tokens shared by consecutive chunks, 0 <= overlap < tokenLimit */
  overlap: number;
}

/**
 * Lazy, finite sequence of chunks. Tokenization happens on first iteration;
 * every new iteration walks the windows again from the start.
 */
export class ChunkSequence implements Iterable<Chunk> {
  private spans: TokenSpan[] | null = null;

  constructor(
    private readonly text: string,
    private readonly options: ChunkerOptions,
    private readonly tokenizer: Tokenizer
  ) {}

  /**
   * Total tokens in the chunked text
   */
  get tokenCount(): number {
    return this.getSpans().length;
  }

  *[Symbol.iterator](): Iterator<Chunk> {
    const spans = this.getSpans();
    const total = spans.length;
    const { tokenLimit, overlap } = this.options;

    if (this.text.length === 0) return;

    if (total <= tokenLimit) {
      yield {
        index: 0,
        text: this.text,
        startToken: 0,
        endToken: total,
        startOffset: 0,
        endOffset: this.text.length,
      };
      return;
    }

    const stride = tokenLimit - overlap;
    let start = 0;
    let index = 0;

    while (true) {
      const end = Math.min(start + tokenLimit, total);
      const first = spans[start];
      const last = spans[end - 1];

      yield {
        index: index++,
        text: this.text.slice(first.start, last.end),
        startToken: start,
        endToken: end,
        startOffset: first.start,
        endOffset: last.end,
      };

      if (end >= total) return;
      start += stride;
    }
  }

  toArray(): Chunk[] {
    return Array.from(this);
  }

  private getSpans(): TokenSpan[] {
    if (this.spans === null) {
      this.spans = this.tokenizer.tokenize(this.text);
    }
    return this.spans;
  }
}

/**
 * Throws InvalidChunkConfigError unless 0 <= overlap < tokenLimit (integers)
 */
export function validateChunkOptions(options: ChunkerOptions): void {
  const { tokenLimit, overlap } = options;

  if (!Number.isInteger(tokenLimit) || tokenLimit <= 0) {
    throw new InvalidChunkConfigError(
      `tokenLimit must be a positive integer (got ${tokenLimit})`,
      { tokenLimit, overlap }
    );
  }

  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= tokenLimit) {
    throw new InvalidChunkConfigError(
      `overlap (${overlap}) must be an integer in [0, ${tokenLimit})`,
      { tokenLimit, overlap }
    );
  }
}

/**
 * Split text into overlapping token chunks. Options are checked eagerly;
 * chunks are produced on iteration.
 */
export function chunkTokens(
  text: string,
  tokenLimit: number,
  overlap: number,
  tokenizer: Tokenizer = new BpeTokenizer()
): ChunkSequence {
  const options = { tokenLimit, overlap };
  validateChunkOptions(options);
  return new ChunkSequence(text, options, tokenizer);
}

/**
 * Reassemble chunk texts, dropping the characters each chunk repeats from
 * its predecessor.
 */
export function mergeChunks(chunks: Iterable<Chunk>): string {
  let merged = "";
  let coveredUntil: number | null = null;

  for (const chunk of chunks) {
    const skip = coveredUntil === null ? 0 : Math.max(0, coveredUntil - chunk.startOffset);
    merged += chunk.text.slice(skip);
    coveredUntil = chunk.endOffset;
  }

  return merged;
}
