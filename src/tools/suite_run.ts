import { z } from "zod";
import { parseConfig } from "../config.js";
import type { CaseResult, SummaryRow } from "../schema/result.js";
import { runSuite } from "../suite.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const correlationKeySchema = z.object({
  identifier: z.string(),
  type: z.string(),
});

export const caseResultSchema: z.ZodType<CaseResult> = z.object({
  useCaseId: z.string(),
  templateId: z.string(),
  testCaseId: z.string(),
  correlationKey: correlationKeySchema.nullable(),
  messageType: z.string(),
  outcome: z.enum(["PASS", "FAIL"]),
  reasonCode: z.enum([
    "VALIDATED",
    "INVALID_ROW",
    "EXPANSION_FAILED",
    "PLACEHOLDER_UNRESOLVED",
    "MISSING_TYPE_FIELD",
    "DUPLICATE_CASE_ID",
    "TRANSMISSION_FAILED",
    "CORRELATION_TIMEOUT",
    "UNEXPECTED_ERROR",
  ]),
  reasons: z.array(z.string()),
  expectedOutcome: z.boolean(),
  validatorPassed: z.boolean().nullable(),
  sentMessage: z.string(),
  receivedMessage: z.string(),
});

export const summaryCountsSchema = z.object({
  total: z.number().int().min(0),
  passed: z.number().int().min(0),
  failed: z.number().int().min(0),
});

export const summaryRowSchema: z.ZodType<SummaryRow> = summaryCountsSchema.extend({
  useCaseId: z.string(),
  testCaseId: z.string().optional(),
  messageType: z.string().optional(),
});

const suiteRunInputSchema = z.object({
  inputFile: z.string().trim().min(1, "inputFile is required"),
  outputDir: z.string().trim().min(1).optional(),
  maxAttempts: z.number().int().min(1).optional(),
  retryDelayMs: z.number().int().min(0).optional(),
  persist: z.boolean().default(true),
});

const suiteRunOutputSchema = z.object({
  runId: z.string().optional(),
  executionId: z.string(),
  totals: summaryCountsSchema,
  byUseCase: z.array(summaryRowSchema),
  byTestCaseAndType: z.array(summaryRowSchema),
  failures: z.array(caseResultSchema),
  files: z.object({
    resultFile: z.string(),
    summaryFile: z.string(),
    summaryByTypeFile: z.string(),
    logFile: z.string(),
  }),
});

export type SuiteRunInput = z.infer<typeof suiteRunInputSchema>;
export type SuiteRunOutput = z.infer<typeof suiteRunOutputSchema>;

export const suiteRunTool: ToolDefinition<SuiteRunInput, SuiteRunOutput> = {
  name: "suite_run",
  description:
    "Execute a CSV case file against the configured transport and record store, write result and summary files, and store the run.",
  inputSchema: suiteRunInputSchema,
  outputSchema: suiteRunOutputSchema,
  handler: async (input: SuiteRunInput, context: ToolContext) => {
    const config = parseConfig({
      ...context.config,
      ...(input.outputDir !== undefined ? { outputDir: input.outputDir } : {}),
      ...(input.maxAttempts !== undefined ? { maxAttempts: input.maxAttempts } : {}),
      ...(input.retryDelayMs !== undefined ? { retryDelayMs: input.retryDelayMs } : {}),
    });

    context.logger?.info("Starting suite run", { inputFile: input.inputFile, outputDir: config.outputDir });
    const { runId, executionId, report, paths } = await runSuite({
      inputFile: input.inputFile,
      config,
      persist: input.persist,
      now: context.now,
    });
    context.logger?.info("Suite run finished", { runId, executionId, ...report.totals });

    return {
      runId,
      executionId,
      totals: report.totals,
      byUseCase: report.summaries.byUseCase,
      byTestCaseAndType: report.summaries.byTestCaseAndType,
      failures: report.results.filter((result) => result.outcome === "FAIL"),
      files: {
        resultFile: paths.resultFile,
        summaryFile: paths.summaryFile,
        summaryByTypeFile: paths.summaryByTypeFile,
        logFile: paths.logFile,
      },
    };
  },
};
