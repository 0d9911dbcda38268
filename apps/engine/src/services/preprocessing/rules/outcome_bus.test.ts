import { describe, it, expect, vi, afterEach } from "vitest";
import { createOutcomeBus } from "./outcome_bus.js";
import type { RuleOutcome } from "../../../schemas/index.js";

const outcome: RuleOutcome = {
  ruleId: "R1",
  category: "validation",
  passed: true,
  metadata: {},
};

describe("OutcomeBus", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should deliver outcomes to subscribers in order", () => {
    const bus = createOutcomeBus();
    const calls: string[] = [];
    bus.subscribe(() => calls.push("first"));
    bus.subscribe(() => calls.push("second"));

    bus.publish(outcome, "run-1");

    expect(calls).toEqual(["first", "second"]);
  });

  it("should pass the run id", () => {
    const bus = createOutcomeBus();
    const handler = vi.fn();
    bus.subscribe(handler);

    bus.publish(outcome, "run-1");

    expect(handler).toHaveBeenCalledWith(outcome, "run-1");
  });

  it("should stop delivering after unsubscribe", () => {
    const bus = createOutcomeBus();
    const handler = vi.fn();
    const unsubscribe = bus.subscribe(handler);

    expect(bus.subscriberCount()).toBe(1);
    unsubscribe();
    bus.publish(outcome, "run-1");

    expect(handler).not.toHaveBeenCalled();
    expect(bus.subscriberCount()).toBe(0);
  });

  it("should keep delivering when a handler throws", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const bus = createOutcomeBus();
    const failure = new Error("subscriber failed");
    const after = vi.fn();
    bus.subscribe(() => {
      throw failure;
    });
    bus.subscribe(after);

    bus.publish(outcome, "run-1");

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith("[OutcomeBus] Handler error:", failure);
  });
});
