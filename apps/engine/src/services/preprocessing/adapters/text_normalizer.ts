/**
 * UnicodeTextNormalizer - NFKC, invisible characters, whitespace
 */

import type { TextNormalizer } from "./types.js";

/** Zero-width space/joiners, word joiner, BOM, soft hyphen */
const INVISIBLE_CHARS = /[\u200B-\u200D\u2060\uFEFF\u00AD]/g;

export class UnicodeTextNormalizer implements TextNormalizer {
  normalize(text: string): string {
    return collapseWhitespace(text.normalize("NFKC").replace(INVISIBLE_CHARS, ""));
  }
}

/**
 * Collapse every whitespace run (tabs, newlines, repeated spaces) to one space and trim
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
