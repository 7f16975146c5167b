#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { Dispatcher } from "./dispatcher.js";
import { serveHttp } from "./http.js";
import { MealieClient } from "./mealie/client.js";
import { createServer } from "./server.js";
import { buildToolRegistry } from "./tools/index.js";

// --- Server Start ---
async function main() {
  console.error("[Setup] Initializing Mealie MCP server...");
  const config = loadConfig();
  const registry = buildToolRegistry();
  const client = new MealieClient({ credentials: config.credentials, timeoutMs: config.timeoutMs });
  const dispatcher = new Dispatcher(registry, client);
  console.error(`[Setup] Registered ${registry.names().length} tools.`);

  if (config.transport === "http") {
    const httpServer = await serveHttp({
      host: config.host,
      port: config.port,
      createMcpServer: () => createServer(registry, dispatcher),
    });
    process.on("SIGINT", () => {
      console.error("[Shutdown] Received SIGINT, closing HTTP server.");
      httpServer.close(() => process.exit(0));
    });
    console.error(`[Setup] Mealie MCP server listening on http://${config.host}:${config.port}/mcp`);
    return;
  }

  const server = createServer(registry, dispatcher);
  const transport = new StdioServerTransport();
  process.on("SIGINT", async () => {
    console.error("[Shutdown] Received SIGINT, closing server.");
    await server.close();
    process.exit(0);
  });
  await server.connect(transport);
  console.error("[Setup] Mealie MCP server running on stdio.");
}

main().catch((error) => {
  console.error("[Fatal] Server failed to start:", error);
  process.exit(1);
});
