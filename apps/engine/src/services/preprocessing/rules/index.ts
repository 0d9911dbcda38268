/**
 * Rules layer - registry, default rule set, outcome bus and engine
 */

export type {
  RuleContext,
  RuleEffect,
  CheckEffect,
  TransformEffect,
  SegmentEffect,
  ChunkEffect,
  ClassifyEffect,
  RuleHandler,
  RuleGuard,
  RuleDefinition,
} from "./rule_types.js";

export { RuleRegistry, createRuleRegistry } from "./registry.js";
export { DEFAULT_RULES, createDefaultRuleRegistry } from "./rule_definitions.js";
export { createOutcomeBus, type OutcomeBus, type OutcomeHandler } from "./outcome_bus.js";
export {
  RuleEngine,
  createRuleEngine,
  type RuleEngineOptions,
  type SequenceResult,
} from "./rule_engine.js";
