/**
 * OffensiveWordMasker - Profanity masking
 *
 * Two passes, both replacing a match with one mask character per character:
 * 1. A whole-word, case-insensitive word list (data/offensive_words.json by
 *    default), for terms the library dataset leaves out.
 * 2. The obscenity English dataset, which also catches obfuscated spellings
 *    (leetspeak, confusable characters, repeated letters).
 *
 * Masked output contains no letters where a term was, so masking twice
 * changes nothing.
 */

import { readFileSync } from "node:fs";
import {
  RegExpMatcher,
  TextCensor,
  englishDataset,
  englishRecommendedTransformers,
  fixedCharCensorStrategy,
} from "obscenity";
import { z } from "zod";
import type { TextMasker } from "./types.js";
import { buildWordPattern } from "./word_pattern.js";

const WORD_LIST_URL = new URL("../../../../data/offensive_words.json", import.meta.url);

const WordListSchema = z.array(z.string().min(1));

let defaultWords: string[] | null = null;
let englishMatcher: RegExpMatcher | null = null;

/**
 * Load (and cache) the bundled offensive word list
 */
export function loadDefaultOffensiveWords(): string[] {
  if (!defaultWords) {
    defaultWords = WordListSchema.parse(JSON.parse(readFileSync(WORD_LIST_URL, "utf-8")));
  }
  return defaultWords;
}

function getEnglishMatcher(): RegExpMatcher {
  if (!englishMatcher) {
    englishMatcher = new RegExpMatcher({
      ...englishDataset.build(),
      ...englishRecommendedTransformers,
    });
  }
  return englishMatcher;
}

export class OffensiveWordMasker implements TextMasker {
  private readonly pattern: RegExp | null;
  private readonly matcher: RegExpMatcher;
  private readonly censor: TextCensor;

  /**
   * @param words - Extra whole-word terms, masked before the dataset pass
   * @param maskChar - Single character used for masking
   */
  constructor(words: string[] = loadDefaultOffensiveWords(), private readonly maskChar = "*") {
    this.pattern = buildWordPattern(words);
    this.matcher = getEnglishMatcher();
    this.censor = new TextCensor().setStrategy(fixedCharCensorStrategy(maskChar));
  }

  mask(text: string): string {
    const listed = this.pattern
      ? text.replace(this.pattern, match => this.maskChar.repeat(match.length))
      : text;

    const matches = this.matcher.getAllMatches(listed, true);
    if (matches.length === 0) return listed;
    return this.censor.applyTo(listed, matches);
  }
}
