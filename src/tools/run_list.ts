import { z } from "zod";
import { listRuns } from "../data/runStore.js";
import { summaryCountsSchema } from "./suite_run.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const runListInputSchema = z.object({
  useCaseId: z.string().trim().optional(),
  pageSize: z.number().int().min(1).max(50).optional(),
  cursor: z.string().optional(),
});

const runSummarySchema = z.object({
  id: z.string(),
  inputFile: z.string(),
  executionId: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  totals: summaryCountsSchema,
  useCaseIds: z.array(z.string()),
});

const runListOutputSchema = z.object({
  runs: z.array(runSummarySchema),
  nextCursor: z.string().optional(),
  total: z.number().int().min(0),
  hasMore: z.boolean(),
});

export type RunListInput = z.infer<typeof runListInputSchema>;
export type RunListOutput = z.infer<typeof runListOutputSchema>;

export const runListTool: ToolDefinition<RunListInput, RunListOutput> = {
  name: "run_list",
  description: "List stored suite runs, newest first, optionally limited to runs that covered a UseCaseID.",
  inputSchema: runListInputSchema,
  outputSchema: runListOutputSchema,
  handler: async (input: RunListInput, context: ToolContext) => {
    const result = await listRuns({
      useCaseId: input.useCaseId || undefined,
      pageSize: input.pageSize,
      cursor: input.cursor,
    });

    context.logger?.info("Listed runs", { total: result.total, returned: result.runs.length });

    return {
      runs: result.runs,
      nextCursor: result.nextCursor,
      total: result.total,
      hasMore: Boolean(result.nextCursor),
    };
  },
};
