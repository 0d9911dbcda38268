/**
 * PiiMasker - Regex masking of personal data
 *
 * Each rule is a named pattern with a fixed placeholder. Placeholders never
 * match any pattern, so masking is idempotent.
 */

import type { TextMasker } from "./types.js";

export interface MaskingRule {
  /** Identifier for logging */
  name: string;
  /** Must carry the global flag */
  pattern: RegExp;
  replacement: string;
}

export const DEFAULT_PII_RULES: MaskingRule[] = [
  {
    name: "email",
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
    replacement: "[EMAIL]",
  },
  {
    // 10 digits, optionally preceded by a country code
    name: "phone",
    pattern: /\b(?:\+?\d{1,3}[\s-]?)?\d{10}\b/g,
    replacement: "[PHONE]",
  },
];

export class PiiMasker implements TextMasker {
  constructor(private readonly rules: MaskingRule[] = DEFAULT_PII_RULES) {
    for (const rule of rules) {
      if (!rule.pattern.global) {
        throw new Error(`Masking rule "${rule.name}" needs a global pattern`);
      }
    }
  }

  mask(text: string): string {
    let masked = text;
    for (const rule of this.rules) {
      masked = masked.replace(rule.pattern, rule.replacement);
    }
    return masked;
  }

  /**
   * Count matches per rule without masking
   */
  countMatches(text: string): Record<string, number> {
    const counts: Record<string, number> = {};
    let remaining = text;
    for (const rule of this.rules) {
      counts[rule.name] = remaining.match(rule.pattern)?.length ?? 0;
      remaining = remaining.replace(rule.pattern, rule.replacement);
    }
    return counts;
  }
}
