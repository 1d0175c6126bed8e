import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { logInfo } from "../core/logging.js";
import * as catalogTools from "./catalog-tools.js";
import { closeServerContext, createServerContext, type ServerContext } from "./context.js";
import * as gateTools from "./gate-tools.js";
import * as knowledgeTools from "./knowledge-tools.js";
import * as selectionTools from "./selection-tools.js";
import { ToolRegistry } from "./tool-registry.js";

// Server configuration
export const SERVER_NAME = "release-obligation-gate";
export const SERVER_VERSION = "0.4.0";

export function createToolRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(catalogTools.getToolDefinitions());
  registry.register(selectionTools.getToolDefinitions());
  registry.register(gateTools.getToolDefinitions());
  registry.register(knowledgeTools.getToolDefinitions());
  return registry;
}

export function createServer(ctx: ServerContext, tools: ToolRegistry = createToolRegistry()): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return tools.callTool(name, args, ctx);
  });

  return server;
}

// Start server
export async function startServer(): Promise<void> {
  // A broken catalog throws here and aborts startup
  const ctx = await createServerContext();
  const server = createServer(ctx);

  const shutdown = (signal: string) => {
    logInfo(`Received ${signal}, shutting down...`);
    closeServerContext(ctx);
    process.exit(0);
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
}
