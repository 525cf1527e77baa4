import { Server, StdioServerTransport } from "../mcp-sdk";

/**
 * Connect a single MCP server over stdio. Everything else must log to stderr, as
 * stdout carries the protocol.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[KB] Listening on stdio");
}
