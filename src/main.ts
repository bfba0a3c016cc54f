#!/usr/bin/env node
/**
 * Process entry point: load config, build state, serve over stdio or HTTP
 */

import type { Server as HttpServer } from "node:http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getConfig } from "./config.js";
import { bootstrap } from "./bootstrap.js";
import { createServer } from "./server.js";
import { startHttpServer } from "./http.js";

async function main(): Promise<void> {
  const config = getConfig();

  console.error("Huggies MCP Server starting...");
  const state = bootstrap(config);
  console.error(
    `Loaded ${state.knowledge.size} FAQs, ${state.catalog.size} widgets, ${state.registry.size} tools`
  );

  let httpServer: HttpServer | null = null;

  if (config.transport.mode === "http") {
    httpServer = await startHttpServer(
      () => createServer(state.dispatcher, config.server),
      config.transport
    );
    console.error(
      `Huggies MCP Server listening on http://${config.transport.host}:${config.transport.port}${config.transport.path}`
    );
  } else {
    const server = createServer(state.dispatcher, config.server);
    await server.connect(new StdioServerTransport());
    console.error("Huggies MCP Server running on stdio");
  }

  const shutdown = (): void => {
    console.error("\nShutting down Huggies MCP Server...");
    if (httpServer) {
      httpServer.close(() => process.exit(0));
    } else {
      process.exit(0);
    }
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

// Run the server
main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
