import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Start the MCP stdio transport. A stdio process serves exactly one client,
 * so it holds a single session workspace for its lifetime.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  const server = createServer();
  await server.connect(new StdioServerTransport());
  console.error("[MCP] Listening on stdio");
}
