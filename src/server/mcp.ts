/**
 * MCP server assembly and the stdio entry point.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { AppContext } from "./context.js";
import { registerWorkflowTools } from "./tools.js";

export const SERVER_NAME = "workflow-gate";
export const SERVER_VERSION = "0.1.0";

export function createMcpServer(ctx: AppContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerWorkflowTools(server, ctx);
  return server;
}

/**
 * Serve over stdio until the transport closes. Resolves once connected;
 * `closed` settles when the client goes away.
 */
export async function startStdioServer(
  ctx: AppContext,
): Promise<{ server: McpServer; closed: Promise<void> }> {
  const server = createMcpServer(ctx);
  const transport = new StdioServerTransport();
  const closed = new Promise<void>((resolve) => {
    transport.onclose = () => resolve();
  });
  await server.connect(transport);
  ctx.logger.info({ name: SERVER_NAME, version: SERVER_VERSION }, "listening on stdio");
  return { server, closed };
}
