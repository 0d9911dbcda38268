/**
 * Classifier - Keyword-count domain routing for questions
 *
 * Each domain scores one point per whole-word, case-insensitive keyword
 * occurrence. The strictly highest score wins. A tie at the top (non-zero)
 * score is reported as "unknown" together with the tied domains and their
 * matched keywords; ambiguity is never resolved in favour of one candidate.
 *
 * This component does NOT:
 * - Decide whether the text is a question (the intent rule's guard does)
 * - Use fuzzy or learned matching
 */

import {
  UNKNOWN_DOMAIN,
  type DomainClassification,
  type DomainKeywords,
} from "../../../schemas/index.js";
import { buildWordPattern } from "../adapters/word_pattern.js";

interface DomainScore {
  domain: string;
  score: number;
  matchedKeywords: string[];
}

/**
 * Score one domain's keywords against the text
 */
function scoreDomain(text: string, domain: string, keywords: string[]): DomainScore {
  const seen = new Set<string>();
  const matchedKeywords: string[] = [];
  let score = 0;

  for (const raw of keywords) {
    const keyword = raw.trim();
    const key = keyword.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);

    const pattern = buildWordPattern([keyword]);
    if (!pattern) continue;

    const hits = text.match(pattern)?.length ?? 0;
    if (hits > 0) {
      score += hits;
      matchedKeywords.push(keyword);
    }
  }

  return { domain, score, matchedKeywords };
}

export function classifyDomain(text: string, domainKeywords: DomainKeywords): DomainClassification {
  const results = Object.entries(domainKeywords).map(([domain, keywords]) =>
    scoreDomain(text, domain, keywords)
  );

  const scores: Record<string, number> = {};
  for (const result of results) {
    scores[result.domain] = result.score;
  }

  const best = results.reduce((max, r) => Math.max(max, r.score), 0);

  if (best === 0) {
    return {
      domain: UNKNOWN_DOMAIN,
      matchedKeywords: [],
      confidenceBasis: "keyword-count",
      scores,
      tiedDomains: [],
    };
  }

  const leaders = results.filter(r => r.score === best);
  const matchedKeywords = [...new Set(leaders.flatMap(r => r.matchedKeywords))];

  if (leaders.length > 1) {
    return {
      domain: UNKNOWN_DOMAIN,
      matchedKeywords,
      confidenceBasis: "keyword-count",
      scores,
      tiedDomains: leaders.map(r => r.domain),
    };
  }

  return {
    domain: leaders[0].domain,
    matchedKeywords,
    confidenceBasis: "keyword-count",
    scores,
    tiedDomains: [],
  };
}
