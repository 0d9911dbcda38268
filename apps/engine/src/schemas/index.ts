/**
 * rulepipe Data Schemas
 *
 * These schemas define the records that flow through the rule engine.
 * Configuration and rule metadata are validated against them at the boundary;
 * results are typed from them so callers can re-validate serialized output.
 */

import { z } from "zod";

// =============================================================================
// 1. Rule Category
// =============================================================================

/**
 * Closed set of rule categories, listed in pipeline phase order.
 */
export const RULE_CATEGORY_ORDER = [
  "validation",
  "normalization",
  "sanitization",
  "structuring",
  "chunking",
  "intent",
] as const;

export const RuleCategorySchema = z.enum(RULE_CATEGORY_ORDER);

export const RuleSeveritySchema = z.enum(["fatal", "warning"]);

export type RuleCategory = z.infer<typeof RuleCategorySchema>;
export type RuleSeverity = z.infer<typeof RuleSeveritySchema>;

/**
 * Phase index of a category (0 = runs first)
 */
export function categoryPhase(category: RuleCategory): number {
  return RULE_CATEGORY_ORDER.indexOf(category);
}

// =============================================================================
// 2. Rule Metadata
// =============================================================================

/**
 * Data half of a rule definition. The handler and guard are functions and
 * are checked separately by the registry.
 */
export const RuleMetadataSchema = z.object({
  id: z.string().min(1),
  category: RuleCategorySchema,
  description: z.string(),
  ruleText: z.string(),
  orderRank: z.number().int(),
  enabled: z.boolean(),
  severity: RuleSeveritySchema.optional(),
});

export type RuleMetadata = z.infer<typeof RuleMetadataSchema>;

// =============================================================================
// 3. Pipeline Config
// =============================================================================

export const DEFAULT_QUESTION_WORDS = ["who", "what", "when", "where", "why", "how"];

export const DomainKeywordsSchema = z.record(
  z.string().min(1),
  z.array(z.string().trim().min(1)).min(1)
);

export const PipelineConfigSchema = z.object({
  /** Rule 2 threshold (non-fatal) */
  minWords: z.number().int().min(0).default(3),
  /** Chunking kicks in above this many tokens */
  tokenLimit: z.number().int().positive(),
  /** Tokens shared between consecutive chunks; checked against tokenLimit when chunking */
  chunkOverlap: z.number().int(),
  /** Domain name -> keywords used by question routing */
  domainKeywords: DomainKeywordsSchema,
  /** Leading words that mark a question */
  questionWords: z.array(z.string().min(1)).default(DEFAULT_QUESTION_WORDS),
});

export type DomainKeywords = z.infer<typeof DomainKeywordsSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

// =============================================================================
// 4. Chunk
// =============================================================================

export const ChunkSchema = z.object({
  /** 0-based position in the sequence */
  index: z.number().int().min(0),
  text: z.string(),
  /** First token covered (inclusive) */
  startToken: z.number().int().min(0),
  /** Token after the last one covered (exclusive) */
  endToken: z.number().int().min(0),
  /** Character offset of the chunk in the chunked text */
  startOffset: z.number().int().min(0),
  endOffset: z.number().int().min(0),
});

export type Chunk = z.infer<typeof ChunkSchema>;

// =============================================================================
// 5. Domain Classification
// =============================================================================

export const UNKNOWN_DOMAIN = "unknown";

export const DomainClassificationSchema = z.object({
  domain: z.string(),
  matchedKeywords: z.array(z.string()),
  confidenceBasis: z.literal("keyword-count"),
  /** Keyword hit count per domain */
  scores: z.record(z.string(), z.number().int().min(0)),
  /** Domains that shared the highest count (empty unless ambiguous) */
  tiedDomains: z.array(z.string()),
});

export type DomainClassification = z.infer<typeof DomainClassificationSchema>;

// =============================================================================
// 6. Rule Outcome & Pipeline Result
// =============================================================================

export const RuleOutcomeSchema = z.object({
  ruleId: z.string(),
  category: RuleCategorySchema,
  passed: z.boolean(),
  outputText: z.string().optional(),
  metadata: z.record(z.string(), z.unknown()),
});

export type RuleOutcome = z.infer<typeof RuleOutcomeSchema>;

export const PipelineStatusSchema = z.enum([
  "completed",
  "short_circuited",
  "aborted",
]);

export const PipelineFailureSchema = z.object({
  ruleId: z.string(),
  errorType: z.string(),
  message: z.string(),
});

export const PipelineResultSchema = z.object({
  runId: z.string().uuid(),
  status: PipelineStatusSchema,
  rawText: z.string(),
  finalText: z.string(),
  outcomes: z.array(RuleOutcomeSchema),
  sentences: z.array(z.string()),
  chunks: z.array(ChunkSchema).optional(),
  classification: DomainClassificationSchema.optional(),
  isQuestion: z.boolean(),
  skippedRules: z.array(z.string()),
  failure: PipelineFailureSchema.optional(),
});

export type PipelineStatus = z.infer<typeof PipelineStatusSchema>;
export type PipelineFailure = z.infer<typeof PipelineFailureSchema>;
export type PipelineResult = z.infer<typeof PipelineResultSchema>;
