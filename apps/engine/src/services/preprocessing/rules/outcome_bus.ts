/**
 * OutcomeBus - Synchronous publication of rule outcomes
 *
 * Every outcome the engine produces is published here as it happens, so
 * callers can trace a run without waiting for the final result.
 *
 * This component does NOT:
 * - Change outcomes or the pipeline flow
 * - Store outcomes between runs
 */

import type { RuleOutcome } from "../../../schemas/index.js";

export type OutcomeHandler = (outcome: RuleOutcome, runId: string) => void;

export interface OutcomeBus {
  /**
   * Subscribe to outcome events
   * @returns Unsubscribe function
   */
  subscribe(handler: OutcomeHandler): () => void;

  /**
   * Deliver an outcome to all subscribers, in subscription order
   */
  publish(outcome: RuleOutcome, runId: string): void;

  subscriberCount(): number;
}

class InMemoryOutcomeBus implements OutcomeBus {
  private handlers: Set<OutcomeHandler> = new Set();

  subscribe(handler: OutcomeHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  publish(outcome: RuleOutcome, runId: string): void {
    for (const handler of this.handlers) {
      try {
        handler(outcome, runId);
      } catch (error) {
        // One failing subscriber must not stop the others or the run
        console.error("[OutcomeBus] Handler error:", error);
      }
    }
  }

  subscriberCount(): number {
    return this.handlers.size;
  }
}

export function createOutcomeBus(): OutcomeBus {
  return new InMemoryOutcomeBus();
}
