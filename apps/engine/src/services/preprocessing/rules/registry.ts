/**
 * RuleRegistry - Explicit, per-pipeline store of rule definitions
 *
 * Registration is expected once at startup. Reads never mutate, so one
 * registry can back many independent runs.
 */

import {
  RuleMetadataSchema,
  categoryPhase,
  type RuleCategory,
} from "../../../schemas/index.js";
import {
  DuplicateRuleError,
  InvalidRuleDefinitionError,
  UnknownRuleError,
} from "../../errors.js";
import type { RuleDefinition } from "./rule_types.js";

export class RuleRegistry {
  private readonly rules: Map<string, RuleDefinition> = new Map();

  /**
   * Register a rule.
   * Fails on a duplicate id, an unknown category, a non-integer rank, a rank
   * already used in the same category, or a missing handler.
   */
  register(rule: RuleDefinition): void {
    if (this.rules.has(rule.id)) {
      throw new DuplicateRuleError(rule.id);
    }

    const parsed = RuleMetadataSchema.safeParse(rule);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new InvalidRuleDefinitionError(
        String(rule.id),
        `Invalid rule definition ${String(rule.id)}: ${issues.join("; ")}`
      );
    }

    if (typeof rule.handler !== "function") {
      throw new InvalidRuleDefinitionError(rule.id, `Rule ${rule.id} has no handler`);
    }

    const clash = Array.from(this.rules.values()).find(
      r => r.category === rule.category && r.orderRank === rule.orderRank
    );
    if (clash) {
      throw new InvalidRuleDefinitionError(
        rule.id,
        `Rule ${rule.id} reuses rank ${rule.orderRank} of ${clash.id} in category ${rule.category}`
      );
    }

    this.rules.set(rule.id, Object.freeze({ ...rule }));
  }

  registerAll(rules: RuleDefinition[]): void {
    for (const rule of rules) {
      this.register(rule);
    }
  }

  unregister(id: string): boolean {
    return this.rules.delete(id);
  }

  get(id: string): RuleDefinition | undefined {
    return this.rules.get(id);
  }

  has(id: string): boolean {
    return this.rules.has(id);
  }

  /**
   * All rules in registration order, enabled or not
   */
  getAll(): RuleDefinition[] {
    return Array.from(this.rules.values());
  }

  get size(): number {
    return this.rules.size;
  }

  setEnabled(id: string, enabled: boolean): void {
    const rule = this.rules.get(id);
    if (!rule) {
      throw new UnknownRuleError(id);
    }
    this.rules.set(id, Object.freeze({ ...rule, enabled }));
  }

  /**
   * Enabled rules in execution order: by phase, then ascending rank.
   * With a category, only that category's rules.
   */
  getOrderedRules(category?: RuleCategory): RuleDefinition[] {
    return Array.from(this.rules.values())
      .filter(rule => rule.enabled && (category === undefined || rule.category === category))
      .sort(
        (a, b) =>
          categoryPhase(a.category) - categoryPhase(b.category) || a.orderRank - b.orderRank
      );
  }
}

export function createRuleRegistry(rules: RuleDefinition[] = []): RuleRegistry {
  const registry = new RuleRegistry();
  registry.registerAll(rules);
  return registry;
}
