/**
 * Default rule set
 *
 * The ten built-in rules, in the order they are listed in the rule
 * catalogue. Execution order comes from category phase and rank, not from
 * this list.
 */

import { chunkTokens } from "../processors/chunker.js";
import { classifyDomain } from "../processors/classifier.js";
import { PiiMasker } from "../adapters/pii_masker.js";
import { RuleRegistry } from "./registry.js";
import type { RuleDefinition, TransformEffect } from "./rule_types.js";

function transform(before: string, after: string): TransformEffect {
  return { kind: "transform", text: after, metadata: { changed: before !== after } };
}

export const DEFAULT_RULES: readonly RuleDefinition[] = [
  {
    id: "R1",
    category: "validation",
    ruleText: "Text must not be empty.",
    description: "Validates that the input text contains at least one non-whitespace character.",
    orderRank: 1,
    enabled: true,
    severity: "fatal",
    handler: state => ({
      kind: "check",
      passed: state.current.trim().length > 0,
      message: "Text must not be empty",
      metadata: { length: state.current.length },
    }),
  },
  {
    id: "R2",
    category: "validation",
    ruleText: "Text must contain N words.",
    description: "Validates that the input text contains at least N words.",
    orderRank: 2,
    enabled: true,
    severity: "warning",
    handler: (state, { config }) => ({
      kind: "check",
      passed: state.wordCount >= config.minWords,
      message: `Text has ${state.wordCount} word(s), expected at least ${config.minWords}`,
      metadata: { wordCount: state.wordCount, minWords: config.minWords },
    }),
  },
  {
    id: "R3",
    category: "intent",
    ruleText:
      "If the input text is a question, identify the domain of the question using domain-specific keywords.",
    description:
      "Detects question intent and routes the query to the appropriate domain for downstream retrieval.",
    orderRank: 1,
    enabled: true,
    appliesTo: state => state.isQuestion,
    handler: (state, { config }) => {
      const classification = classifyDomain(state.current, config.domainKeywords);
      return {
        kind: "classify",
        classification,
        metadata: {
          domain: classification.domain,
          matchedKeywords: [...classification.matchedKeywords],
          tiedDomains: [...classification.tiedDomains],
        },
      };
    },
  },
  {
    id: "R4",
    category: "chunking",
    ruleText:
      "If the text exceeds the model token limit, split it into overlapping chunks using the model tokenizer.",
    description: "Keeps chunks within the token limit while overlapping neighbours for context.",
    orderRank: 1,
    enabled: true,
    appliesTo: (state, { config }) => state.tokenCount > config.tokenLimit,
    handler: (state, { config, primitives }) => {
      const sequence = chunkTokens(
        state.current,
        config.tokenLimit,
        config.chunkOverlap,
        primitives.tokenizer
      );
      const chunks = sequence.toArray();
      return {
        kind: "chunk",
        chunks,
        metadata: {
          tokenCount: sequence.tokenCount,
          tokenLimit: config.tokenLimit,
          overlap: config.chunkOverlap,
          chunkCount: chunks.length,
          boundaries: chunks.map(c => [c.startToken, c.endToken]),
        },
      };
    },
  },
  {
    id: "R5",
    category: "sanitization",
    ruleText:
      "Remove or mask all offensive and abusive words from the text before downstream processing.",
    description: "Masks words from the offensive word list with one '*' per character.",
    orderRank: 4,
    enabled: true,
    handler: (state, { primitives }) =>
      transform(state.current, primitives.offensiveMasker.mask(state.current)),
  },
  {
    id: "R6",
    category: "sanitization",
    ruleText:
      "Detect and mask personally identifiable information such as email addresses and phone numbers.",
    description: "Masks PII before downstream processing.",
    orderRank: 3,
    enabled: true,
    handler: (state, { primitives }) => {
      const { piiMasker } = primitives;
      const effect = transform(state.current, piiMasker.mask(state.current));
      if (piiMasker instanceof PiiMasker) {
        effect.metadata = { ...effect.metadata, matches: piiMasker.countMatches(state.current) };
      }
      return effect;
    },
  },
  {
    id: "R7",
    category: "normalization",
    ruleText:
      "Normalize text by removing invisible unicode characters and standardizing whitespace.",
    description: "Applies NFKC, drops invisible characters and collapses whitespace.",
    orderRank: 1,
    enabled: true,
    handler: (state, { primitives }) =>
      transform(state.current, primitives.normalizer.normalize(state.current)),
  },
  {
    id: "R8",
    category: "structuring",
    ruleText:
      "Split input text into well-formed sentences using punctuation and normalize sentence boundaries.",
    description: "Segments text into sentences before chunking or retrieval.",
    orderRank: 1,
    enabled: true,
    handler: (state, { primitives }) => {
      const sentences = primitives.segmenter.segment(state.current);
      return { kind: "segment", sentences, metadata: { sentenceCount: sentences.length } };
    },
  },
  {
    id: "R9",
    category: "sanitization",
    ruleText: "Remove URLs and web artifacts from text before downstream processing.",
    description: "Eliminates URL noise to improve embedding and retrieval quality.",
    orderRank: 1,
    enabled: true,
    handler: (state, { primitives }) =>
      transform(state.current, primitives.urlStripper.strip(state.current)),
  },
  {
    id: "R10",
    category: "sanitization",
    ruleText: "Remove HTML and markup tags from the text before downstream processing.",
    description: "Strips markup so downstream steps see plain text.",
    orderRank: 2,
    enabled: true,
    handler: (state, { primitives }) =>
      transform(state.current, primitives.htmlStripper.strip(state.current)),
  },
];

export function createDefaultRuleRegistry(): RuleRegistry {
  const registry = new RuleRegistry();
  registry.registerAll([...DEFAULT_RULES]);
  return registry;
}
