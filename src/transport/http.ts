/**
 * Streamable HTTP transport.
 *
 * Session model:
 *  - A client starts with a JSON-RPC `initialize` request to POST /mcp without
 *    an `mcp-session-id` header. A new transport and MCP Server (and with it a
 *    fresh document session + research agent) are created; the SDK returns the
 *    generated session id in the response headers.
 *  - Every later request for that session carries the same `mcp-session-id`.
 *  - When the transport closes the session is evicted and its server closed.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : Streaming / follow-up channel.
 *  - DELETE /mcp  : Session teardown.
 *  - GET  /health : Status / readiness snapshot from `statusManager`.
 *
 * DNS rebinding protection is on by default and the allowed hosts are local
 * only unless ALLOWED_HOSTS overrides them.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { HttpSettings } from "../config";
import { errorMessage } from "../errors";
import { statusManager } from "../status";

export function defaultAllowedHosts(host: string, port: number): string[] {
  return Array.from(
    new Set([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  );
}

/**
 * Build the Express app. Split from {@link startHttpTransport} so the routes
 * can be mounted without binding a port.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` for each session.
 */
export function createHttpApp(createServer: () => Server, settings: HttpSettings): express.Express {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const allowedHosts = settings.allowedHosts ?? defaultAllowedHosts(settings.host, settings.port);
  /** Active session transports mapped by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = req.header("mcp-session-id");
      let transport = sessionId ? transports.get(sessionId) : undefined;

      // Session creation path: only when no header AND the body is an initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports.set(sid, created);
          },
          enableDnsRebindingProtection: settings.dnsRebindingProtection,
          allowedHosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          // Detach first: server.close() closes the transport again.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error(`[MCP] Failed to close session: ${errorMessage(e)}`));
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
      console.error("[MCP] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET / DELETE /mcp: only valid for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = req.header("mcp-session-id");
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
    res.json(statusManager.getStatus());
  });

  return app;
}

/**
 * Bind the HTTP app.
 *
 * @returns Resolves once the listener is bound.
 */
export async function startHttpTransport(createServer: () => Server, settings: HttpSettings): Promise<void> {
  const app = createHttpApp(createServer, settings);
  await new Promise<void>((resolve) => {
    app.listen(settings.port, settings.host, () => {
      console.error(`[MCP] Streamable HTTP listening at http://${settings.host}:${settings.port}/mcp`);
      resolve();
    });
  });
}
