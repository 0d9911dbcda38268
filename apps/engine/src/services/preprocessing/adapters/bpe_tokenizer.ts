/**
 * BpeTokenizer - Model tokenizer backed by tiktoken encodings
 *
 * Counts tokens the way OpenAI-style models do (cl100k_base by default).
 * Spans are recovered by decoding tokens in order against the source text.
 * A token that ends inside a multi-byte character gets an empty span at the
 * current offset, and the character is credited to the token that completes
 * it. Spans therefore tile the text exactly.
 */

import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import type { Tokenizer, TokenSpan } from "./types.js";

export const DEFAULT_ENCODING: TiktokenEncoding = "cl100k_base";

// Building an encoding parses its rank table; share one per name
const encodingCache = new Map<TiktokenEncoding, Tiktoken>();

function loadEncoding(name: TiktokenEncoding): Tiktoken {
  let encoding = encodingCache.get(name);
  if (!encoding) {
    encoding = getEncoding(name);
    encodingCache.set(name, encoding);
  }
  return encoding;
}

export class BpeTokenizer implements Tokenizer {
  private readonly encoding: Tiktoken;

  constructor(readonly encodingName: TiktokenEncoding = DEFAULT_ENCODING) {
    this.encoding = loadEncoding(encodingName);
  }

  /**
   * Token ids for the text. Special-token markers are encoded as plain text.
   */
  encode(text: string): number[] {
    return this.encoding.encode(text, [], []);
  }

  tokenize(text: string): TokenSpan[] {
    const ids = this.encode(text);
    const spans: TokenSpan[] = [];
    let offset = 0;
    let pendingFrom = 0;

    for (let i = 0; i < ids.length; i++) {
      const decoded = this.encoding.decode(ids.slice(pendingFrom, i + 1));

      if (!text.startsWith(decoded, offset)) {
        // Incomplete character: wait for the token that finishes it
        spans.push({ token: "", start: offset, end: offset });
        continue;
      }

      spans.push({ token: decoded, start: offset, end: offset + decoded.length });
      offset += decoded.length;
      pendingFrom = i + 1;
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
    if (!text) return 0;
    return this.encode(text).length;
  }
}
