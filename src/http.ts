import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server as HttpServer,
  type ServerResponse,
} from "node:http";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";

export interface HttpOptions {
  host: string;
  port: number;
  /** A fresh MCP server per request; the HTTP transport runs stateless. */
  createMcpServer: () => Server;
}

const MCP_PATH = "/mcp";

function sendJsonRpcError(res: ServerResponse, status: number, message: string): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ jsonrpc: "2.0", error: { code: -32000, message }, id: null }));
}

async function handle(req: IncomingMessage, res: ServerResponse, options: HttpOptions): Promise<void> {
  const path = new URL(req.url ?? "/", "http://localhost").pathname;
  if (path !== MCP_PATH) {
    sendJsonRpcError(res, 404, `Not found: ${path}`);
    return;
  }
  if (req.method !== "POST") {
    sendJsonRpcError(res, 405, "Method not allowed.");
    return;
  }

  const server = options.createMcpServer();
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
  res.on("close", () => {
    transport.close().catch((error: unknown) => console.error("[Error] Closing HTTP transport failed:", error));
    server.close().catch((error: unknown) => console.error("[Error] Closing MCP server failed:", error));
  });
  await server.connect(transport);
  await transport.handleRequest(req, res);
}

export function serveHttp(options: HttpOptions): Promise<HttpServer> {
  const httpServer = createHttpServer((req, res) => {
    handle(req, res, options).catch((error: unknown) => {
      console.error("[Error] HTTP request failed:", error);
      if (!res.headersSent) sendJsonRpcError(res, 500, "Internal server error");
    });
  });

  return new Promise((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve(httpServer);
    });
  });
}
