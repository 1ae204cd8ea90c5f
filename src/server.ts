import { randomUUID } from "node:crypto";
import { createRequire } from "node:module";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { loadConfig, type RunnerConfig } from "./config.js";
import {
  connectToTransport,
  createMcpServer,
  createTransport,
  type McpServer,
  type ServerRequestExtra,
  type TransportStreams,
} from "./framework/mcpServerKit.js";
import { createLogger, log } from "./logger.js";
import { caseExpandTool } from "./tools/case_expand.js";
import { messageValidateTool } from "./tools/message_validate.js";
import { runGetTool } from "./tools/run_get.js";
import { runListTool } from "./tools/run_list.js";
import { suiteRunTool } from "./tools/suite_run.js";
import type { ToolContext, ToolDefinition } from "./tools/types.js";

// Keep server version in sync with package.json
const require = createRequire(import.meta.url);
const { version: pkgVersion } = z.object({ version: z.string() }).parse(require("../package.json"));
export const SERVER_VERSION = pkgVersion;

/** A tool with its input and output types erased for registration. */
interface RegisteredTool {
  name: string;
  description: string;
  inputShape: z.ZodRawShape;
  outputShape: z.ZodRawShape;
  run: (args: unknown, context: ToolContext) => Promise<Record<string, unknown>>;
}

function shapeOf(schema: z.ZodTypeAny): z.ZodRawShape {
  return schema instanceof z.ZodObject ? schema.shape : {};
}

function toStructured(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { value };
  }
  return Object.fromEntries(Object.entries(value));
}

function registrable<Input, Output>(tool: ToolDefinition<Input, Output>): RegisteredTool {
  return {
    name: tool.name,
    description: tool.description,
    inputShape: shapeOf(tool.inputSchema),
    outputShape: shapeOf(tool.outputSchema),
    run: async (args, context) => toStructured(await tool.handler(tool.inputSchema.parse(args ?? {}), context)),
  };
}

const TOOL_REGISTRY: RegisteredTool[] = [
  registrable(caseExpandTool),
  registrable(messageValidateTool),
  registrable(suiteRunTool),
  registrable(runListTool),
  registrable(runGetTool),
];

export async function buildServer(streams?: TransportStreams) {
  const config = await loadConfig({ file: process.env.TAGCASE_CONFIG || undefined });

  log({
    level: "info",
    component: "server",
    message: "Building tagcase server",
    meta: {
      version: SERVER_VERSION,
      runsPathEnv: process.env.TAGCASE_RUNS_PATH || "(default)",
      configFile: process.env.TAGCASE_CONFIG || "(none)",
    },
  });

  const server = createMcpServer({
    name: "tagcase",
    version: SERVER_VERSION,
    title: "tagcase",
  });

  TOOL_REGISTRY.forEach((tool) => registerTool(server, tool, config));
  await registerDefaultResources(server);

  const transport = createTransport(streams);
  return { server, transport };
}

export async function start(streams?: TransportStreams) {
  const { server, transport } = await buildServer(streams);

  await connectToTransport(server, transport);
}

async function loadFirstAvailable(paths: string[]): Promise<{ path: string; text: string }> {
  for (const candidate of paths) {
    try {
      const text = await readFile(candidate, "utf8");
      return { path: candidate, text };
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        throw error;
      }
    }
  }

  throw new Error(`Resource not found in any candidate paths: ${paths.join(", ")}`);
}

async function registerDefaultResources(server: McpServer) {
  const moduleDir = fileURLToPath(new URL("..", import.meta.url));
  const projectRoot = resolve(moduleDir, "..");

  const resources = [
    {
      uri: "doc://tagcase/README",
      name: "Project README",
      description: "Case file format, configuration and usage of tagcase.",
      mimeType: "text/markdown",
      candidates: [resolve(moduleDir, "README.md"), resolve(projectRoot, "README.md")],
    },
  ];

  await Promise.all(
    resources.map(async (resource) => {
      try {
        await loadFirstAvailable(resource.candidates);
        server.registerResource(
          resource.name,
          resource.uri,
          {
            description: resource.description,
            mimeType: resource.mimeType,
          },
          async () => {
            const { text } = await loadFirstAvailable(resource.candidates);
            return {
              contents: [
                {
                  uri: resource.uri,
                  mimeType: resource.mimeType,
                  text,
                },
              ],
            };
          },
        );
      } catch (error) {
        log({
          level: "error",
          component: "resources",
          message: `Failed to register resource ${resource.uri}`,
          meta: { error, attemptedPaths: resource.candidates },
        });
      }
    }),
  );
}

function registerTool(server: McpServer, tool: RegisteredTool, config: RunnerConfig) {
  server.registerTool(
    tool.name,
    {
      description: tool.description,
      inputSchema: tool.inputShape,
      outputSchema: tool.outputShape,
    },
    async (args, extra) => {
      const context = createToolContext(tool.name, config, extra);
      const structuredContent = await tool.run(args, context);

      return {
        content: [
          {
            type: "text" as const,
            text: JSON.stringify(structuredContent, null, 2),
          },
        ],
        structuredContent,
      };
    },
  );
}

function createToolContext(toolName: string, config: RunnerConfig, extra?: ServerRequestExtra): ToolContext {
  const requestId = extra?.requestId !== undefined ? String(extra.requestId) : randomUUID();

  return {
    requestId,
    now: () => new Date(),
    config,
    logger: createLogger({ component: `tool:${toolName}`, requestId }),
  };
}
