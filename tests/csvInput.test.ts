import { describe, expect, it } from "vitest";
import { parseConfig } from "../src/config.js";
import { SuiteRunner } from "../src/engine/runner.js";
import { parseCaseTemplates, parseExpectedOutcome } from "../src/io/csvInput.js";
import { FakeCounterparty, counterIdentifiers, noSleep } from "./fakes.js";

const HEADER = "UseCaseID,TestCaseID,BaseMessage,TagsToUpdate,TagsToValidate,ExpectedValidationResult";

describe("parseExpectedOutcome", () => {
  it("accepts the usual spellings", () => {
    expect(parseExpectedOutcome(undefined)).toBe(true);
    expect(parseExpectedOutcome("")).toBe(true);
    expect(parseExpectedOutcome("  Yes ")).toBe(true);
    expect(parseExpectedOutcome("PASS")).toBe(true);
    expect(parseExpectedOutcome("N")).toBe(false);
    expect(parseExpectedOutcome("fail")).toBe(false);
    expect(parseExpectedOutcome("maybe")).toBeNull();
  });
});

describe("parseCaseTemplates", () => {
  it("turns rows into templates and reports bad rows", () => {
    const rows = parseCaseTemplates(
      [
        HEADER,
        "UC1,TC1,8=FIX.4.4|35=D,38=100|[44~99]=1,39=0,true",
        "UC1,TC2,8=FIX.4.4|35=D,,39=8,FAIL",
        "",
        "UC2,,8=FIX.4.4,,,",
        "UC2,TC4,8=FIX.4.4,,,maybe",
      ].join("\n"),
    );

    expect(rows).toEqual([
      {
        ok: true,
        template: {
          useCaseId: "UC1",
          testCaseId: "TC1",
          baseMessage: "8=FIX.4.4|35=D",
          updateSpec: "38=100|[44~99]=1",
          validateSpec: "39=0",
          expectedOutcome: true,
          rowNumber: 1,
        },
      },
      {
        ok: true,
        template: {
          useCaseId: "UC1",
          testCaseId: "TC2",
          baseMessage: "8=FIX.4.4|35=D",
          updateSpec: "",
          validateSpec: "39=8",
          expectedOutcome: false,
          rowNumber: 2,
        },
      },
      {
        ok: false,
        failure: { rowNumber: 3, useCaseId: "UC2", testCaseId: "row-3", message: "TestCaseID: TestCaseID is required" },
      },
      {
        ok: false,
        failure: {
          rowNumber: 4,
          useCaseId: "UC2",
          testCaseId: "TC4",
          message: "ExpectedValidationResult must be true or false, received 'maybe'",
        },
      },
    ]);
  });

  it("strips a byte order mark and accepts the ValidationResult column", () => {
    const rows = parseCaseTemplates(
      "\uFEFFUseCaseID,TestCaseID,BaseMessage,TagsToUpdate,TagsToValidate,ValidationResult\r\nUC1,TC1,35=D,,,no\r\n",
    );

    expect(rows).toHaveLength(1);
    const [row] = rows;
    expect(row?.ok && row.template.expectedOutcome).toBe(false);
    expect(row?.ok && row.template.useCaseId).toBe("UC1");
  });

  it("defaults a missing outcome column to an expected pass", () => {
    const rows = parseCaseTemplates("UseCaseID,TestCaseID,BaseMessage,TagsToUpdate,TagsToValidate\nUC1,TC1,35=D,,\n");
    const [row] = rows;
    expect(row?.ok && row.template.expectedOutcome).toBe(true);
  });

  it("rejects a short row instead of running it with empty columns", () => {
    const rows = parseCaseTemplates([HEADER, "UC1,TC1,8=FIX.4.4|35=D,38=100", "UC1,TC2,35=D,,39=0,true"].join("\n"));

    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual({
      ok: false,
      failure: {
        rowNumber: 1,
        useCaseId: "UC1",
        testCaseId: "TC1",
        message: "Malformed CSV line: Too few fields: expected 6 fields but parsed 4",
      },
    });
    expect(rows[1]?.ok).toBe(true);
  });

  it("rejects a row with an extra field", () => {
    const [row] = parseCaseTemplates([HEADER, "UC1,TC1,35=D,,39=0,true,surplus"].join("\n"));

    expect(row?.ok).toBe(false);
    expect(row?.ok === false && row.failure.message).toBe(
      "Malformed CSV line: Too many fields: expected 6 fields but parsed 7",
    );
  });

  it("rejects the row holding an unbalanced quote", () => {
    const rows = parseCaseTemplates(
      [HEADER, "UC1,TC1,35=D,,39=0,true", 'UC1,TC2,"8=FIX.4.4|35=D,38=100,39=0,true'].join("\n"),
    );

    expect(rows).toHaveLength(2);
    expect(rows[0]?.ok).toBe(true);
    expect(rows[1]).toEqual({
      ok: false,
      failure: {
        rowNumber: 2,
        useCaseId: "UC1",
        testCaseId: "TC2",
        message: expect.stringContaining("Quoted field unterminated"),
      },
    });
  });

  it("fails a short row when the suite runs", async () => {
    const runner = new SuiteRunner(parseConfig({ maxAttempts: 1, retryDelayMs: 0 }), {
      transport: new FakeCounterparty(),
      recordStore: new FakeCounterparty(),
      sleep: noSleep,
      generateIdentifier: counterIdentifiers(),
    });
    const report = await runner.runRows(parseCaseTemplates([HEADER, "UC1,TC1,8=FIX.4.4|35=D,38=100"].join("\n")));

    expect(report.results).toHaveLength(1);
    expect(report.results[0]).toMatchObject({
      testCaseId: "TC1",
      outcome: "FAIL",
      reasonCode: "INVALID_ROW",
      reasons: ["Row 1: Malformed CSV line: Too few fields: expected 6 fields but parsed 4"],
    });
  });
});
