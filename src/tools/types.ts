import type { z } from "zod";
import type { RunnerConfig } from "../config.js";

export interface ToolContext {
  requestId: string;
  now: () => Date;
  config: RunnerConfig;
  logger?: {
    info: (message: string, meta?: unknown) => void;
    error: (message: string, meta?: unknown) => void;
  };
}

export interface ToolDefinition<Input = unknown, Output = unknown> {
  name: string;
  description: string;
  inputSchema: z.ZodType<Input, z.ZodTypeDef, unknown>;
  outputSchema: z.ZodType<Output, z.ZodTypeDef, unknown>;
  handler: (input: Input, context: ToolContext) => Promise<Output>;
}
