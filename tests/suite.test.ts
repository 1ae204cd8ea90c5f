import { mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { parseConfig } from "../src/config.js";
import { getRun } from "../src/data/runStore.js";
import { runSuite } from "../src/suite.js";
import { FakeCounterparty, noSleep } from "./fakes.js";

const workDir = mkdtempSync(join(tmpdir(), "tagcase-suite-"));
process.env.TAGCASE_RUNS_PATH = join(workDir, "runs.json");

const inputFile = join(workDir, "cases.csv");
writeFileSync(
  inputFile,
  [
    "UseCaseID,TestCaseID,BaseMessage,TagsToUpdate,TagsToValidate,ExpectedValidationResult",
    "UC1,TC1,8=FIX.4.4|35=D|55=IBM,38=100,39=0,true",
    "UC1,TC2,8=FIX.4.4|35=D,1001=A~B,39=8,false",
    "UC2,,8=FIX.4.4|35=D,,,",
    "",
  ].join("\n"),
);

describe("runSuite", () => {
  it("executes a case file, writes the reports and stores the run", async () => {
    const outputDir = join(workDir, "out");
    const counterparty = new FakeCounterparty();
    const progress: string[] = [];

    const { runId, executionId, report, paths } = await runSuite({
      inputFile,
      config: parseConfig({ outputDir, maxAttempts: 1, retryDelayMs: 0 }),
      transport: counterparty,
      recordStore: counterparty,
      sleep: noSleep,
      echoLogs: false,
      now: () => new Date(2024, 0, 2, 3, 4, 5),
      hooks: {
        onCaseComplete: (result, position) =>
          progress.push(`${position.index}/${position.total} ${result.testCaseId} ${result.outcome}`),
      },
    });

    expect(executionId).toBe("240102_030405");
    expect(progress).toEqual(["1/1 TC1 PASS", "1/2 TC2-1 PASS", "2/2 TC2-2 PASS", "1/1 row-3 FAIL"]);
    expect(report.totals).toEqual({ total: 4, passed: 3, failed: 1 });
    expect(counterparty.sent).toHaveLength(3);

    expect(paths.resultFile).toBe(join(outputDir, "test_result_240102_030405.csv"));
    const resultLines = readFileSync(paths.resultFile, "utf8").trimEnd().split("\n");
    expect(resultLines).toHaveLength(5);
    expect(resultLines[4]).toBe("UC2,row-3,N/A,MISSING,FAIL,PASS,INVALID_ROW,Row 3: TestCaseID: TestCaseID is required,,");
    expect(readFileSync(paths.summaryFile, "utf8")).toBe("UseCaseID,Total,Passed,Failed\nUC1,3,3,0\nUC2,1,0,1\n");

    const [firstLog] = readFileSync(paths.logFile, "utf8").split("\n");
    expect(JSON.parse(firstLog ?? "{}")).toMatchObject({
      level: "info",
      message: "Execution started",
      component: "runner",
      requestId: "240102_030405",
    });

    expect(runId).toMatch(/^run_/);
    const stored = await getRun(runId ?? "");
    expect(stored?.totals).toEqual({ total: 4, passed: 3, failed: 1 });
    expect(stored?.reportFiles?.resultFile).toBe(paths.resultFile);
  });

  it("skips the run history when asked", async () => {
    const counterparty = new FakeCounterparty();
    const { runId } = await runSuite({
      inputFile,
      config: parseConfig({ outputDir: join(workDir, "out-2"), maxAttempts: 1, retryDelayMs: 0 }),
      transport: counterparty,
      recordStore: counterparty,
      sleep: noSleep,
      echoLogs: false,
      persist: false,
    });

    expect(runId).toBeUndefined();
  });
});
