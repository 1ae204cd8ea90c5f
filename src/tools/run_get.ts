import { z } from "zod";
import { getRun } from "../data/runStore.js";
import { caseResultSchema, summaryCountsSchema, summaryRowSchema } from "./suite_run.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const runGetInputSchema = z.object({
  runId: z.string().min(1, "Run identifier is required"),
  outcome: z.enum(["PASS", "FAIL"]).optional(),
  useCaseId: z.string().trim().optional(),
});

const runGetOutputSchema = z.object({
  id: z.string(),
  inputFile: z.string(),
  executionId: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  totals: summaryCountsSchema,
  byUseCase: z.array(summaryRowSchema),
  byTestCaseAndType: z.array(summaryRowSchema),
  results: z.array(caseResultSchema),
});

export type RunGetInput = z.infer<typeof runGetInputSchema>;
export type RunGetOutput = z.infer<typeof runGetOutputSchema>;

export const runGetTool: ToolDefinition<RunGetInput, RunGetOutput> = {
  name: "run_get",
  description: "Fetch a stored suite run with its per-case results, optionally filtered by outcome or UseCaseID.",
  inputSchema: runGetInputSchema,
  outputSchema: runGetOutputSchema,
  handler: async (input: RunGetInput, context: ToolContext) => {
    const run = await getRun(input.runId);
    if (!run) {
      throw new Error(`Run ${input.runId} not found`);
    }

    const results = run.results.filter(
      (result) =>
        (!input.outcome || result.outcome === input.outcome) &&
        (!input.useCaseId || result.useCaseId === input.useCaseId),
    );

    context.logger?.info("Fetched run", { runId: run.id, returned: results.length, total: run.results.length });

    return {
      id: run.id,
      inputFile: run.inputFile,
      executionId: run.executionId,
      startedAt: run.startedAt,
      finishedAt: run.finishedAt,
      totals: run.totals,
      byUseCase: run.summaries.byUseCase,
      byTestCaseAndType: run.summaries.byTestCaseAndType,
      results,
    };
  },
};
