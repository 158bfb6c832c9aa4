/**
 * HTTP transport: the REST API plus, optionally, the MCP streamable HTTP
 * endpoint on one Express application.
 *
 * MCP session model:
 *  - A client begins by sending a JSON-RPC `initialize` request to POST /mcp
 *    WITHOUT an `mcp-session-id` header.
 *  - A new transport + MCP Server pair is created; the SDK returns the generated
 *    session id (UUID v4) in the `mcp-session-id` response header.
 *  - Subsequent requests for that session MUST carry the same header.
 *  - When the transport or server closes, the session is evicted from the map.
 *
 * MCP endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : streaming / follow-up channel (delegated to transport).
 *  - DELETE /mcp  : client-requested session teardown.
 *
 * DNS rebinding protection is on unless disabled; allowed hosts default to the
 * loopback names plus the bound host, with and without the port.
 */
import express from "express";
import cors from "cors";
import type { Server as HttpServer } from "node:http";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { errorHandler } from "../errors";
import type { AppServices } from "../services";
import { createApiRouter } from "./routes";

export interface McpOptions {
  /** Factory producing a fresh, unconnected MCP server per session. */
  createServer: () => Server;
  allowedHosts: string[];
  enableDnsRebindingProtection: boolean;
}

export interface HttpAppOptions {
  corsOrigins?: string[];
  /** Mount /mcp when provided. */
  mcp?: McpOptions;
}

/** Loopback + bound host names accepted by the MCP endpoint by default. */
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

function headerValue(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

function mountMcp(app: express.Express, opts: McpOptions): void {
  /** Active session transports mapped by session id. */
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = headerValue(req.headers["mcp-session-id"]);
      let transport: StreamableHTTPServerTransport | undefined = sessionId
        ? transports[sessionId]
        : undefined;

      // Session creation: only when no header AND the body is an initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports[sid] = created;
          },
          enableDnsRebindingProtection: opts.enableDnsRebindingProtection,
          allowedHosts: opts.allowedHosts,
        });
        transport = created;

        const server = opts.createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) delete transports[created.sessionId];
          // server.close() closes the transport again; detach first to avoid re-entry.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[MCP] Error closing server:", e));
        };
        await server.connect(created);
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

  // GET and DELETE are only valid for an existing session.
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = headerValue(req.headers["mcp-session-id"]);
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[MCP] HTTP ${req.method} error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);
}

/**
 * Assemble the Express application. Kept separate from {@link startHttpTransport}
 * so tests can bind it to an ephemeral port.
 */
export function createHttpApp(services: AppServices, opts: HttpAppOptions = {}): express.Express {
  const app = express();
  const origins = opts.corsOrigins ?? ["*"];
  app.use(cors({ origin: origins.includes("*") ? "*" : origins }));
  app.use(express.json({ limit: "2mb" }));

  if (opts.mcp) {
    mountMcp(app, opts.mcp);
    services.status.markTransport("mcp");
  }
  app.use(createApiRouter(services));
  services.status.markTransport("rest");
  app.use(errorHandler);
  return app;
}

/**
 * Bind the application.
 * @returns Resolves with the listening server once bound.
 */
export async function startHttpTransport(
  app: express.Express,
  port: number,
  host: string,
): Promise<HttpServer> {
  return new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(port, host, () => {
      console.error(`[HTTP] Listening at http://${host}:${port}`);
      resolve(server);
    });
    server.once("error", reject);
  });
}
