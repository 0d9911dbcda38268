/**
 * TextState - Text as it moves through one pipeline run
 *
 * `raw` never changes. Every transform yields a new state whose derived
 * values (word count, question flag, token count) follow `current`.
 * Token counting goes through the tokenizer, so it is computed lazily and
 * cached per state.
 */

import type { Tokenizer } from "../adapters/types.js";
import { DEFAULT_QUESTION_WORDS } from "../../../schemas/index.js";

export class TextState {
  private cachedTokenCount: number | null = null;

  private constructor(
    readonly raw: string,
    readonly current: string,
    private readonly tokenizer: Tokenizer,
    private readonly questionWords: readonly string[]
  ) {}

  static initial(
    raw: string,
    tokenizer: Tokenizer,
    questionWords: readonly string[] = DEFAULT_QUESTION_WORDS
  ): TextState {
    return new TextState(raw, raw, tokenizer, questionWords);
  }

  withText(next: string): TextState {
    if (next === this.current) return this;
    return new TextState(this.raw, next, this.tokenizer, this.questionWords);
  }

  get wordCount(): number {
    return countWords(this.current);
  }

  get isQuestion(): boolean {
    return isQuestion(this.current, this.questionWords);
  }

  get tokenCount(): number {
    if (this.cachedTokenCount === null) {
      this.cachedTokenCount = this.tokenizer.count(this.current);
    }
    return this.cachedTokenCount;
  }
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * A question ends with "?" or opens with an interrogative word
 * (case-insensitive, leading punctuation ignored).
 */
export function isQuestion(
  text: string,
  questionWords: readonly string[] = DEFAULT_QUESTION_WORDS
): boolean {
  const trimmed = text.trim();
  if (trimmed.endsWith("?")) return true;

  const leading = trimmed.match(/^[^\p{L}\p{N}]*(\p{L}+)/u);
  if (!leading) return false;

  const word = leading[1].toLowerCase();
  return questionWords.some(q => q.toLowerCase() === word);
}
