import { describe, expect, it } from "vitest";
import { Aggregator } from "../src/engine/aggregator.js";
import type { CaseResult } from "../src/schema/result.js";

function result(overrides: Partial<CaseResult>): CaseResult {
  return {
    useCaseId: "UC1",
    templateId: "TC1",
    testCaseId: "TC1",
    correlationKey: null,
    messageType: "D",
    outcome: "PASS",
    reasonCode: "VALIDATED",
    reasons: [],
    expectedOutcome: true,
    validatorPassed: true,
    sentMessage: "",
    receivedMessage: "",
    ...overrides,
  };
}

describe("Aggregator", () => {
  it("counts per use case and per row and type", () => {
    const aggregator = new Aggregator();
    aggregator.record(result({ testCaseId: "TC1-1" }));
    aggregator.record(result({ testCaseId: "TC1-1-F", messageType: "F", outcome: "FAIL" }));
    aggregator.record(result({ testCaseId: "TC1-2" }));
    aggregator.record(result({ useCaseId: "UC2", templateId: "TC9", testCaseId: "TC9", outcome: "FAIL" }));

    expect(aggregator.rows("useCase")).toEqual([
      { useCaseId: "UC1", total: 3, passed: 2, failed: 1 },
      { useCaseId: "UC2", total: 1, passed: 0, failed: 1 },
    ]);
    expect(aggregator.rows("useCaseTestCaseType")).toEqual([
      { useCaseId: "UC1", testCaseId: "TC1", messageType: "D", total: 2, passed: 2, failed: 0 },
      { useCaseId: "UC1", testCaseId: "TC1", messageType: "F", total: 1, passed: 0, failed: 1 },
      { useCaseId: "UC2", testCaseId: "TC9", messageType: "D", total: 1, passed: 0, failed: 1 },
    ]);
    expect(aggregator.overall()).toEqual({ total: 4, passed: 2, failed: 2 });
  });

  it("hands out copies of its rows", () => {
    const aggregator = new Aggregator();
    aggregator.record(result({}));
    const [row] = aggregator.rows("useCase");
    if (row) {
      row.total = 99;
    }

    expect(aggregator.summaries().byUseCase[0]?.total).toBe(1);
  });
});
