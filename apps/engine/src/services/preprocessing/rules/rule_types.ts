/**
 * Rule definition types
 *
 * Rules are plain data registered explicitly at startup. A handler is a pure
 * function of the current text state and returns a tagged effect that the
 * engine applies; handlers never mutate shared state.
 */

import type {
  Chunk,
  DomainClassification,
  PipelineConfig,
  RuleMetadata,
} from "../../../schemas/index.js";
import type { TextPrimitives } from "../adapters/types.js";
import type { TextState } from "../processors/text_state.js";

export interface RuleContext {
  config: PipelineConfig;
  primitives: TextPrimitives;
}

type EffectMetadata = Record<string, unknown>;

export interface CheckEffect {
  kind: "check";
  passed: boolean;
  /** Explanation used when the check fails */
  message: string;
  metadata?: EffectMetadata;
}

export interface TransformEffect {
  kind: "transform";
  text: string;
  metadata?: EffectMetadata;
}

export interface SegmentEffect {
  kind: "segment";
  sentences: string[];
  metadata?: EffectMetadata;
}

export interface ChunkEffect {
  kind: "chunk";
  chunks: Chunk[];
  metadata?: EffectMetadata;
}

export interface ClassifyEffect {
  kind: "classify";
  classification: DomainClassification;
  metadata?: EffectMetadata;
}

export type RuleEffect =
  | CheckEffect
  | TransformEffect
  | SegmentEffect
  | ChunkEffect
  | ClassifyEffect;

export type RuleHandler = (state: TextState, context: RuleContext) => RuleEffect;

/** Applicability guard: when false the rule is skipped without an outcome */
export type RuleGuard = (state: TextState, context: RuleContext) => boolean;

export interface RuleDefinition extends RuleMetadata {
  handler: RuleHandler;
  appliesTo?: RuleGuard;
}
