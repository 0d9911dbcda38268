/**
 * Markup and web-artifact strippers
 *
 * URL removal runs before tag removal in the default rule set, so the URL
 * pattern stops at quotes and angle brackets instead of eating through a tag.
 */

import type { TextStripper } from "./types.js";
import { collapseWhitespace } from "./text_normalizer.js";

/**
 * http(s) or www. runs, not ending on sentence punctuation. Never starts
 * inside a word or an email address.
 */
const URL_PATTERN = /(?<![\w@.-])(?:https?:\/\/|www\.)[^\s<>"']*[^\s<>"'.,;:!?)\]]/gi;

const HTML_TAG_PATTERN = /<[^>]+>/g;

export class UrlStripper implements TextStripper {
  constructor(private readonly replacement: string = "") {}

  strip(text: string): string {
    return collapseWhitespace(text.replace(URL_PATTERN, this.replacement));
  }
}

export class HtmlStripper implements TextStripper {
  strip(text: string): string {
    return collapseWhitespace(text.replace(HTML_TAG_PATTERN, ""));
  }
}
