import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, type CallToolResult, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { Dispatcher, ToolCallResult } from "./dispatcher.js";
import type { ToolRegistry } from "./tools/registry.js";

export const SERVER_NAME = "mealie-mcp-server";
export const SERVER_VERSION = "0.1.0";

const INSTRUCTIONS = `Tools for the Mealie recipe manager.
- Search and read recipes; create, update and delete them; set recipe images.
- View and manage meal plans; use get_todays_date or get_date_offset to work out dates.
- Read shopping lists and add, update or remove their items.
Failed calls return an error with a kind: retry RateLimitedError after retry_after seconds, fix the named field on ValidationError.`;

export function toCallToolResult(result: ToolCallResult): CallToolResult {
  if (result.status === "success") {
    return {
      content: [{ type: "text", text: JSON.stringify(result.payload, null, 2) }],
      structuredContent: result.payload,
    };
  }
  const error = {
    kind: result.kind,
    message: result.message,
    field: result.field,
    retry_after: result.retryAfter,
  };
  return {
    isError: true,
    content: [{ type: "text", text: JSON.stringify({ error }, null, 2) }],
  };
}

// --- MCP Server Setup ---
export function createServer(registry: ToolRegistry, dispatcher: Dispatcher): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} }, instructions: INSTRUCTIONS },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    console.error("[Info] Listing tools");
    return { tools: registry.list() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const result = await dispatcher.dispatch({
      toolName: request.params.name,
      arguments: request.params.arguments,
      signal: extra.signal,
    });
    return toCallToolResult(result);
  });

  server.onerror = (error) => console.error("[MCP Error]", error);
  return server;
}
