import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import Papa from "papaparse";
import type { CaseResult, RunSummaries } from "../schema/result.js";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYMMDD_HHMMSS`. */
export function formatExecutionId(date: Date): string {
  return (
    `${pad(date.getFullYear() % 100)}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export interface ReportPaths {
  resultFile: string;
  summaryFile: string;
  summaryByTypeFile: string;
  logFile: string;
}

export function reportPaths(outputDir: string, executionId: string): ReportPaths {
  return {
    resultFile: join(outputDir, `test_result_${executionId}.csv`),
    summaryFile: join(outputDir, `test_summary_${executionId}.csv`),
    summaryByTypeFile: join(outputDir, `test_summary_by_type_${executionId}.csv`),
    logFile: join(outputDir, `tagcase_run_${executionId}.log`),
  };
}

export const RESULT_COLUMNS = [
  "UseCaseID",
  "TestCaseID",
  "ExecutionID",
  "MessageType",
  "ValidationResult",
  "ExpectedResult",
  "ReasonCode",
  "ValidationDetails",
  "SentMessage",
  "ReceivedMessage",
] as const;

export function resultsToCsv(results: CaseResult[]): string {
  return Papa.unparse(
    {
      fields: [...RESULT_COLUMNS],
      data: results.map((result) => [
        result.useCaseId,
        result.testCaseId,
        result.correlationKey?.identifier ?? "N/A",
        result.messageType || "MISSING",
        result.outcome,
        result.expectedOutcome ? "PASS" : "FAIL",
        result.reasonCode,
        result.reasons.join(" | "),
        result.sentMessage,
        result.receivedMessage,
      ]),
    },
    { newline: "\n" },
  );
}

export function summariesToCsv(summaries: RunSummaries): { byUseCase: string; byTestCaseAndType: string } {
  return {
    byUseCase: Papa.unparse(
      {
        fields: ["UseCaseID", "Total", "Passed", "Failed"],
        data: summaries.byUseCase.map((row) => [row.useCaseId, row.total, row.passed, row.failed]),
      },
      { newline: "\n" },
    ),
    byTestCaseAndType: Papa.unparse(
      {
        fields: ["UseCaseID", "TestCaseID", "MessageType", "Total", "Passed", "Failed"],
        data: summaries.byTestCaseAndType.map((row) => [
          row.useCaseId,
          row.testCaseId ?? "",
          row.messageType || "MISSING",
          row.total,
          row.passed,
          row.failed,
        ]),
      },
      { newline: "\n" },
    ),
  };
}

export async function writeReports(
  paths: ReportPaths,
  results: CaseResult[],
  summaries: RunSummaries,
): Promise<void> {
  await mkdir(dirname(paths.resultFile), { recursive: true });
  const summaryCsv = summariesToCsv(summaries);
  await writeFile(paths.resultFile, `${resultsToCsv(results)}\n`, "utf8");
  await writeFile(paths.summaryFile, `${summaryCsv.byUseCase}\n`, "utf8");
  await writeFile(paths.summaryByTypeFile, `${summaryCsv.byTestCaseAndType}\n`, "utf8");
}
