import { describe, expect, it } from "vitest";
import { PatternCache, applyExpectedOutcome, validate } from "../src/engine/validator.js";

describe("validate", () => {
  it("passes an empty expectation only when the tag is absent", () => {
    expect(validate(new Map([["55", ""]]), new Map([["35", "8"]]))).toEqual({
      passed: true,
      reasons: ["PASS: Tag 55 correctly absent"],
    });
    expect(validate(new Map([["55", ""]]), new Map([["55", "IBM"]]))).toEqual({
      passed: false,
      reasons: ["FAIL: Tag 55 expected absent but found IBM"],
    });
  });

  it("matches the whole value", () => {
    expect(validate(new Map([["39", "0"]]), new Map([["39", "10"]]))).toEqual({
      passed: false,
      reasons: ["FAIL: Tag 39 mismatch. Pattern: 0, Actual: 10"],
    });
    expect(validate(new Map([["39", "0|2"]]), new Map([["39", "2"]]))).toEqual({
      passed: true,
      reasons: ["PASS: Tag 39 matched 0|2"],
    });
  });

  it("gives one reason per tag and fails when any tag fails", () => {
    const outcome = validate(
      new Map([
        ["39", "0"],
        ["44", "\\d+"],
      ]),
      new Map([["39", "0"]]),
    );

    expect(outcome.passed).toBe(false);
    expect(outcome.reasons).toEqual(["PASS: Tag 39 matched 0", "FAIL: Tag 44 missing. Pattern: \\d+"]);
  });

  it("fails a tag whose pattern does not compile", () => {
    const outcome = validate(new Map([["58", "("]]), new Map([["58", "x"]]));

    expect(outcome.passed).toBe(false);
    expect(outcome.reasons[0]).toMatch(/^FAIL: Tag 58 has invalid pattern \(: /);
  });
});

describe("PatternCache", () => {
  it("compiles each pattern once", () => {
    const cache = new PatternCache();
    const first = cache.get("A.*");

    expect(cache.get("A.*")).toBe(first);
    expect(cache.get("B.*")).not.toBe(first);
  });
});

describe("applyExpectedOutcome", () => {
  it("inverts the verdict when failure is expected", () => {
    expect(applyExpectedOutcome(true, true)).toBe(true);
    expect(applyExpectedOutcome(false, true)).toBe(false);
    expect(applyExpectedOutcome(false, false)).toBe(true);
    expect(applyExpectedOutcome(true, false)).toBe(false);
  });
});
