import { describe, it, expect } from "vitest";
import { buildWordPattern, escapeRegExp } from "./word_pattern.js";

describe("escapeRegExp", () => {
  it("should escape regex metacharacters", () => {
    expect(escapeRegExp("a.b*c")).toBe("a\\.b\\*c");
    expect(escapeRegExp("(x)")).toBe("\\(x\\)");
  });
});

describe("buildWordPattern", () => {
  it("should return null for an empty list", () => {
    expect(buildWordPattern([])).toBeNull();
    expect(buildWordPattern(["  "])).toBeNull();
  });

  it("should match whole words case-insensitively", () => {
    const pattern = buildWordPattern(["refund"]);
    expect("Refunds refund REFUND".match(pattern ?? /$^/g)).toEqual(["refund", "REFUND"]);
  });

  it("should treat keywords literally", () => {
    const pattern = buildWordPattern(["c++"]);
    expect("I like c++ a lot".match(pattern ?? /$^/g)).toEqual(["c++"]);
  });

  it("should not match inside digits or underscores", () => {
    const pattern = buildWordPattern(["id"]);
    expect("id2 _id id".match(pattern ?? /$^/g)).toEqual(["id"]);
  });
});
