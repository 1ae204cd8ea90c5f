import { z } from "zod";
import { ExpansionError } from "../engine/errors.js";
import { expandTemplate } from "../engine/expansion.js";
import { encode, fieldMapToObject } from "../engine/tagCodec.js";
import type { ConcreteCase } from "../schema/case.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const caseExpandInputSchema = z.object({
  useCaseId: z.string().trim().min(1, "UseCaseID is required"),
  testCaseId: z.string().trim().min(1, "TestCaseID is required"),
  baseMessage: z.string().trim().min(1, "BaseMessage is required"),
  tagsToUpdate: z.string().default(""),
  tagsToValidate: z.string().default(""),
  expectedOutcome: z.boolean().default(true),
});

export const concreteCaseSchema = z.object({
  testCaseId: z.string(),
  templateId: z.string(),
  role: z.enum(["primary", "secondary"]),
  parentTestCaseId: z.string().optional(),
  identifier: z.string(),
  baseMessage: z.string(),
  updates: z.record(z.string()),
  validations: z.record(z.string()),
  expectedOutcome: z.boolean(),
});

const caseExpandOutputSchema = z.object({
  count: z.number().int().min(0),
  cases: z.array(concreteCaseSchema),
});

export type CaseExpandInput = z.infer<typeof caseExpandInputSchema>;
export type CaseExpandOutput = z.infer<typeof caseExpandOutputSchema>;

export const caseExpandTool: ToolDefinition<CaseExpandInput, CaseExpandOutput> = {
  name: "case_expand",
  description:
    "Expand one test row (group shorthand, multi-value axis, type chaining) into the concrete cases it would execute.",
  inputSchema: caseExpandInputSchema,
  outputSchema: caseExpandOutputSchema,
  handler: async (input: CaseExpandInput, context: ToolContext) => {
    const { config } = context;
    let cases: ConcreteCase[];
    try {
      cases = expandTemplate(
        {
          useCaseId: input.useCaseId,
          testCaseId: input.testCaseId,
          baseMessage: input.baseMessage,
          updateSpec: input.tagsToUpdate,
          validateSpec: input.tagsToValidate,
          expectedOutcome: input.expectedOutcome,
        },
        { config },
      );
    } catch (error) {
      if (error instanceof ExpansionError) {
        context.logger?.error("Expansion rejected", { testCaseId: input.testCaseId, error: error.message });
      }
      throw error;
    }

    context.logger?.info("Expanded test row", { testCaseId: input.testCaseId, count: cases.length });

    return {
      count: cases.length,
      cases: cases.map((concrete) => ({
        testCaseId: concrete.testCaseId,
        templateId: concrete.templateId,
        role: concrete.role,
        parentTestCaseId: concrete.parentTestCaseId,
        identifier: concrete.identifier,
        baseMessage: encode(concrete.baseMessage, config.fieldDelimiter),
        updates: fieldMapToObject(concrete.updateMap),
        validations: fieldMapToObject(concrete.validateMap),
        expectedOutcome: concrete.expectedOutcome,
      })),
    };
  },
};
