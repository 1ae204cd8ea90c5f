import { Readable, Writable } from "node:stream";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { RequestHandlerExtra } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { ServerNotification, ServerRequest } from "@modelcontextprotocol/sdk/types.js";

export type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export interface ServerIdentity {
  name: string;
  version: string;
  title?: string;
  instructions?: string;
}

export type ServerRequestExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

export interface TransportStreams {
  input?: Readable;
  output?: Writable;
}

const DEFAULT_INSTRUCTIONS =
  "Expand tagged message test rows with case_expand, check single messages with message_validate, " +
  "execute CSV case files with suite_run, and inspect earlier executions with run_list and run_get.";

export function createMcpServer(identity: ServerIdentity): McpServer {
  return new McpServer(
    {
      name: identity.name,
      version: identity.version,
      title: identity.title ?? identity.name,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        logging: {},
      },
      instructions: identity.instructions ?? DEFAULT_INSTRUCTIONS,
    },
  );
}

export async function connectToTransport(server: McpServer, transport: StdioServerTransport): Promise<void> {
  await server.connect(transport);
}

/** Process stdio unless streams are given, as tests do. */
export function createTransport(streams?: TransportStreams): StdioServerTransport {
  return new StdioServerTransport(streams?.input, streams?.output);
}
