/**
 * Streamable HTTP transport for the knowledgebase MCP server.
 *
 * Session model: a client opens a session with an `initialize` request to POST /mcp
 * and no `mcp-session-id` header. That creates a transport + server pair keyed by a
 * generated session id, which the client sends on every later request.
 *
 * Endpoints:
 *  - POST   /mcp    JSON-RPC requests (initial + subsequent).
 *  - GET    /mcp    Streaming channel for an existing session.
 *  - DELETE /mcp    Session teardown.
 *  - GET    /health Status snapshot from the {@link StatusManager}.
 *
 * Environment variables:
 *  MCP_PORT (default 3000), HOST (default 127.0.0.1), ALLOWED_HOSTS (comma-separated
 *  host[:port] whitelist), ENABLE_DNS_REBINDING_PROTECTION ("false" disables).
 */
import express from "express";
import { randomUUID } from "node:crypto";
import { Server, StreamableHTTPServerTransport, isInitializeRequest } from "../mcp-sdk";
import type { StatusManager } from "../status";

function sessionIdOf(req: express.Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" && header ? header : undefined;
}

/**
 * Bootstraps the Express HTTP server & per-session MCP transport layer.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` for each session.
 * @returns Resolves once the HTTP listener is bound.
 */
export async function startHttpTransport(
  createServer: () => Server,
  status: StatusManager,
): Promise<void> {
  const app = express();
  app.use(express.json({ limit: "8mb" }));

  const port = Number(process.env.MCP_PORT ?? 3000);
  const host = (process.env.HOST ?? "127.0.0.1").trim();
  const defaultAllowedHosts = Array.from(
    new Set<string>([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  );
  const allowedHosts = (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  const enableDnsRebindingProtection =
    (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false";

  // sessionId -> transport
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? transports.get(sessionId) : undefined;

      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports.set(sid, created);
          },
          enableDnsRebindingProtection,
          allowedHosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          // server.close() closes the transport again; detach first to avoid re-entry.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[KB] Error closing session:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[KB] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  // GET and DELETE only make sense for an existing session.
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(status.getStatus());
  });

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      console.error(`[KB] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}
