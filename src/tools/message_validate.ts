import { z } from "zod";
import { parseValidateSpec } from "../engine/expansion.js";
import { decode } from "../engine/tagCodec.js";
import { applyExpectedOutcome, validate } from "../engine/validator.js";
import type { FieldMap } from "../schema/case.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const messageValidateInputSchema = z.object({
  expected: z.string().min(1, "Expected tags are required"),
  actual: z.string(),
  actualEncoding: z.enum(["field", "wire"]).default("field"),
  expectedOutcome: z.boolean().default(true),
});

const messageValidateOutputSchema = z.object({
  passed: z.boolean(),
  validatorPassed: z.boolean(),
  reasons: z.array(z.string()),
});

export type MessageValidateInput = z.infer<typeof messageValidateInputSchema>;
export type MessageValidateOutput = z.infer<typeof messageValidateOutputSchema>;

export const messageValidateTool: ToolDefinition<MessageValidateInput, MessageValidateOutput> = {
  name: "message_validate",
  description:
    "Check a message against expected tag patterns. An empty expected value requires the tag to be absent; other values are full-match regular expressions.",
  inputSchema: messageValidateInputSchema,
  outputSchema: messageValidateOutputSchema,
  handler: async (input: MessageValidateInput, context: ToolContext) => {
    const { config } = context;
    const expected: FieldMap = new Map();
    for (const [tag, values] of parseValidateSpec(input.expected, config)) {
      expected.set(tag, values[0] ?? "");
    }

    const delimiter = input.actualEncoding === "wire" ? config.wireDelimiter : config.fieldDelimiter;
    const verdict = validate(expected, decode(input.actual, delimiter));
    const passed = applyExpectedOutcome(verdict.passed, input.expectedOutcome);

    context.logger?.info("Validated message", { tags: expected.size, passed });

    return {
      passed,
      validatorPassed: verdict.passed,
      reasons: verdict.reasons,
    };
  },
};
