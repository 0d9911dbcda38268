/**
 * RuleEngine - Deterministic preprocessing pipeline
 *
 * Purpose: Run registered rules over raw text in phase order and report
 * every step as a RuleOutcome.
 *
 * Phases: validation -> normalization -> sanitization -> structuring ->
 * chunking -> intent. A failed fatal check short-circuits the run; a rule
 * error from the engine's taxonomy aborts it with a terminal failed outcome.
 * Any other error propagates to the caller.
 *
 * This component does NOT:
 * - Own global state (registry, primitives and bus are injected)
 * - Suspend or perform I/O while running
 */

import { v4 as uuid } from "uuid";
import type {
  Chunk,
  DomainClassification,
  PipelineConfigInput,
  PipelineConfig,
  PipelineFailure,
  PipelineResult,
  PipelineStatus,
  RuleOutcome,
} from "../../../schemas/index.js";
import { parsePipelineConfig } from "../../config.js";
import {
  RuleEngineError,
  SoftValidationWarning,
  UnknownRuleError,
  ValidationFailure,
} from "../../errors.js";
import { createDefaultPrimitives } from "../adapters/index.js";
import type { TextPrimitives } from "../adapters/types.js";
import { TextState } from "../processors/text_state.js";
import { createOutcomeBus, type OutcomeBus } from "./outcome_bus.js";
import { RuleRegistry } from "./registry.js";
import { createDefaultRuleRegistry } from "./rule_definitions.js";
import type { RuleContext, RuleDefinition, RuleEffect } from "./rule_types.js";

export interface RuleEngineOptions {
  registry?: RuleRegistry;
  primitives?: TextPrimitives;
  outcomeBus?: OutcomeBus;
  /** Log every rule outcome */
  verbose?: boolean;
}

export interface SequenceResult {
  segments: string[];
  outcomes: RuleOutcome[];
}

interface Execution {
  outcome: RuleOutcome;
  effect: RuleEffect;
  /** Set when a failed check carries fatal severity */
  failure?: RuleEngineError;
}

function deepFreeze(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }
}

/**
 * Outcomes are immutable once produced, metadata included
 */
function freezeOutcome(outcome: RuleOutcome): RuleOutcome {
  deepFreeze(outcome.metadata);
  return Object.freeze(outcome);
}

export class RuleEngine {
  readonly registry: RuleRegistry;
  readonly primitives: TextPrimitives;
  readonly outcomeBus: OutcomeBus;
  private readonly verbose: boolean;

  constructor(options: RuleEngineOptions = {}) {
    this.registry = options.registry ?? createDefaultRuleRegistry();
    this.primitives = options.primitives ?? createDefaultPrimitives();
    this.outcomeBus = options.outcomeBus ?? createOutcomeBus();
    this.verbose = options.verbose ?? false;
  }

  /**
   * Run the full pipeline over raw text.
   * Throws ConfigurationError before any rule runs when the config is invalid.
   */
  run(rawText: string, config: PipelineConfigInput): PipelineResult {
    const resolved = parsePipelineConfig(config);
    const runId = uuid();
    const context = this.createContext(resolved);

    let state = TextState.initial(rawText, this.primitives.tokenizer, resolved.questionWords);
    const outcomes: RuleOutcome[] = [];
    const skippedRules: string[] = [];
    let sentences: string[] = [];
    let chunks: Chunk[] | undefined;
    let classification: DomainClassification | undefined;

    const finish = (status: PipelineStatus, failure?: PipelineFailure): PipelineResult => ({
      runId,
      status,
      rawText,
      finalText: state.current,
      outcomes,
      sentences,
      chunks,
      classification,
      isQuestion: state.isQuestion,
      skippedRules,
      failure,
    });

    for (const rule of this.registry.getOrderedRules()) {
      let execution: Execution | null;
      try {
        execution =
          !rule.appliesTo || rule.appliesTo(state, context)
            ? this.execute(rule, state, context)
            : null;
      } catch (error) {
        if (!(error instanceof RuleEngineError)) throw error;

        const outcome = freezeOutcome({
          ruleId: rule.id,
          category: rule.category,
          passed: false,
          metadata: { errorType: error.type, message: error.message, ...error.context },
        });
        this.record(outcome, runId, outcomes);
        console.warn(`[RuleEngine] Run ${runId.substring(0, 8)} aborted at ${rule.id}: ${error.message}`);
        return finish("aborted", { ruleId: rule.id, errorType: error.type, message: error.message });
      }

      if (!execution) {
        skippedRules.push(rule.id);
        this.log(runId, `${rule.id} skipped`);
        continue;
      }

      const { outcome, effect, failure } = execution;
      this.record(outcome, runId, outcomes);

      if (failure) {
        console.warn(
          `[RuleEngine] Run ${runId.substring(0, 8)} short-circuited at ${rule.id}: ${failure.message}`
        );
        return finish("short_circuited", {
          ruleId: rule.id,
          errorType: failure.type,
          message: failure.message,
        });
      }

      switch (effect.kind) {
        case "transform":
          state = state.withText(effect.text);
          break;
        case "segment":
          sentences = effect.sentences;
          state = state.withText(effect.sentences.join(" "));
          break;
        case "chunk":
          chunks = effect.chunks;
          break;
        case "classify":
          classification = effect.classification;
          break;
        case "check":
          break;
      }
    }

    this.log(runId, `completed with ${outcomes.length} outcome(s), ${skippedRules.length} skipped`);
    return finish("completed");
  }

  /**
   * Run one rule on a fresh state, ignoring its guard
   */
  applyRule(ruleId: string, text: string, config: PipelineConfigInput): RuleOutcome {
    const rule = this.requireRule(ruleId);
    const resolved = parsePipelineConfig(config);
    const state = TextState.initial(text, this.primitives.tokenizer, resolved.questionWords);
    const { outcome } = this.execute(rule, state, this.createContext(resolved));
    this.outcomeBus.publish(outcome, uuid());
    return outcome;
  }

  /**
   * Run every enabled validation rule without short-circuiting
   */
  validateAll(text: string, config: PipelineConfigInput): Record<string, boolean> {
    const resolved = parsePipelineConfig(config);
    const context = this.createContext(resolved);
    const state = TextState.initial(text, this.primitives.tokenizer, resolved.questionWords);
    const runId = uuid();

    const results: Record<string, boolean> = {};
    for (const rule of this.registry.getOrderedRules("validation")) {
      const { outcome } = this.execute(rule, state, context);
      this.outcomeBus.publish(outcome, runId);
      results[rule.id] = outcome.passed;
    }
    return results;
  }

  /**
   * Run named rules in the given order over a list of segments.
   * Transforms map each segment; segmenting and chunking rules expand
   * segments; checks and classifications leave them unchanged.
   */
  applySequence(text: string, ruleIds: string[], config: PipelineConfigInput): SequenceResult {
    const rules = ruleIds.map(id => this.requireRule(id));
    const resolved = parsePipelineConfig(config);
    const context = this.createContext(resolved);
    const runId = uuid();

    let segments = [text];
    const outcomes: RuleOutcome[] = [];

    for (const rule of rules) {
      const next: string[] = [];

      for (const segment of segments) {
        const state = TextState.initial(segment, this.primitives.tokenizer, resolved.questionWords);
        const { outcome, effect } = this.execute(rule, state, context);
        this.record(outcome, runId, outcomes);

        switch (effect.kind) {
          case "transform":
            next.push(effect.text);
            break;
          case "segment":
            next.push(...effect.sentences);
            break;
          case "chunk":
            next.push(...effect.chunks.map(chunk => chunk.text));
            break;
          case "check":
          case "classify":
            next.push(segment);
            break;
        }
      }

      segments = next;
    }

    return { segments, outcomes };
  }

  getRuleInfo(ruleId: string): RuleDefinition | undefined {
    return this.registry.get(ruleId);
  }

  private createContext(config: PipelineConfig): RuleContext {
    return { config, primitives: this.primitives };
  }

  private requireRule(ruleId: string): RuleDefinition {
    const rule = this.registry.get(ruleId);
    if (!rule) {
      throw new UnknownRuleError(ruleId);
    }
    return rule;
  }

  /**
   * Invoke a rule's handler and turn its effect into an outcome
   */
  private execute(rule: RuleDefinition, state: TextState, context: RuleContext): Execution {
    const effect = rule.handler(state, context);
    const base = { ruleId: rule.id, category: rule.category };

    switch (effect.kind) {
      case "check": {
        if (effect.passed) {
          return {
            effect,
            outcome: freezeOutcome({ ...base, passed: true, metadata: { ...effect.metadata } }),
          };
        }

        const severity = rule.severity ?? "fatal";
        const error =
          severity === "fatal"
            ? new ValidationFailure(rule.id, effect.message, effect.metadata)
            : new SoftValidationWarning(rule.id, effect.message, effect.metadata);

        return {
          effect,
          failure: severity === "fatal" ? error : undefined,
          outcome: freezeOutcome({
            ...base,
            passed: false,
            metadata: {
              ...effect.metadata,
              severity,
              errorType: error.type,
              message: error.message,
            },
          }),
        };
      }
      case "transform":
        return {
          effect,
          outcome: freezeOutcome({
            ...base,
            passed: true,
            outputText: effect.text,
            metadata: { ...effect.metadata },
          }),
        };
      case "segment":
        return {
          effect,
          outcome: freezeOutcome({
            ...base,
            passed: true,
            outputText: effect.sentences.join(" "),
            metadata: { ...effect.metadata, sentences: [...effect.sentences] },
          }),
        };
      case "chunk":
      case "classify":
        return {
          effect,
          outcome: freezeOutcome({ ...base, passed: true, metadata: { ...effect.metadata } }),
        };
    }
  }

  private record(outcome: RuleOutcome, runId: string, outcomes: RuleOutcome[]): void {
    outcomes.push(outcome);
    this.outcomeBus.publish(outcome, runId);
    this.log(runId, `${outcome.ruleId} ${outcome.passed ? "passed" : "failed"}`);
  }

  private log(runId: string, message: string): void {
    if (this.verbose) {
      console.log(`[RuleEngine] Run ${runId.substring(0, 8)}: ${message}`);
    }
  }
}

export function createRuleEngine(options: RuleEngineOptions = {}): RuleEngine {
  return new RuleEngine(options);
}
