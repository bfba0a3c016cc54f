/**
 * Huggies widget MCP Server
 *
 * Mounts the dispatcher's four operations on an MCP SDK server. The SDK
 * handles JSON-RPC framing; everything below it is the dispatcher's.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { Dispatcher } from "./dispatcher.js";
import type { ServerConfig } from "./types.js";

export function createServer(dispatcher: Dispatcher, info: ServerConfig["server"]): Server {
  const server = new Server(
    {
      name: info.name,
      version: info.version,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: dispatcher.listTools(),
  }));

  // Widget markup, listed both as resources and as resource templates
  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: dispatcher.listResources(),
  }));

  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => ({
    resourceTemplates: dispatcher.listResourceTemplates(),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) =>
    dispatcher.readResource(request.params.uri)
  );

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return dispatcher.callTool(name, args);
  });

  return server;
}
