/**
 * MCP mount — Streamable HTTP transport
 *
 * Serves the upstream MCP application under /mcp. An upstream that already
 * exports an HTTP handler is mounted as-is; an upstream that exports an MCP
 * server (or a factory for one) is served here over Streamable HTTP with
 * stateful sessions.
 */

import { randomUUID } from "node:crypto";
import express, { type Request, type RequestHandler, type Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

import { SessionMultiplexer } from "./session-multiplexer.js";
import type { ConnectableServer, Logger, UpstreamMcp } from "./types.js";

type ServerUpstream = Extract<UpstreamMcp, { kind: "server" | "factory" }>;

/**
 * Connects each new session transport to the upstream. A factory builds a
 * server per session; a shared instance is connected once, to a
 * multiplexer that the session transports are attached to.
 */
function sessionConnector(mcp: ServerUpstream): (transport: Transport) => Promise<void> {
  if (mcp.kind === "factory") {
    const create = mcp.create;
    return (transport) => create().connect(transport);
  }

  const server = mcp.server;
  const multiplexer = new SessionMultiplexer();
  let connected: Promise<void> | undefined;

  return async (transport) => {
    connected ??= server.connect(multiplexer).catch((err: unknown) => {
      connected = undefined;
      throw err;
    });
    await connected;
    await multiplexer.attach(transport);
    const onclose = transport.onclose;
    transport.onclose = () => {
      multiplexer.detach(transport);
      onclose?.();
    };
  };
}

function sessionIdOf(req: Request): string | undefined {
  return req.header("mcp-session-id");
}

function jsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({ jsonrpc: "2.0", error: { code, message }, id: null });
}

/**
 * Streamable HTTP endpoints, relative to the mount point:
 *
 * POST   / — client→server JSON-RPC (init + tool calls)
 * GET    / — server→client SSE stream (notifications)
 * DELETE / — session teardown
 */
export function streamableHttpRouter(mcp: ServerUpstream, logger: Logger = console): express.Router {
  const router = express.Router();
  const connect = sessionConnector(mcp);
  const transports = new Map<string, StreamableHTTPServerTransport>();

  router.post("/", express.json(), async (req: Request, res: Response) => {
    try {
      const sessionId = sessionIdOf(req);
      const existing = sessionId ? transports.get(sessionId) : undefined;

      if (existing) {
        await existing.handleRequest(req, res, req.body);
        return;
      }

      if (!sessionId && isInitializeRequest(req.body)) {
        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          enableJsonResponse: true,
          onsessioninitialized: (sid) => {
            transports.set(sid, transport);
          },
        });

        transport.onclose = () => {
          const sid = transport.sessionId;
          if (sid) transports.delete(sid);
        };

        await connect(transport);
        await transport.handleRequest(req, res, req.body);
        return;
      }

      jsonRpcError(res, 400, -32000, "Bad Request: no valid session ID or initialization request");
    } catch (err) {
      logger.error("[mcp] POST error:", err);
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, "Internal server error");
      }
    }
  });

  const handleSessionRequest = async (req: Request, res: Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      logger.error(`[mcp] ${req.method} error:`, err);
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, "Internal server error");
      }
    }
  };

  router.get("/", handleSessionRequest);
  router.delete("/", handleSessionRequest);

  return router;
}

/** The request handler to mount at /mcp for whatever the upstream exported. */
export function mcpRouter(mcp: UpstreamMcp, logger: Logger = console): RequestHandler {
  if (mcp.kind === "handler") {
    return mcp.handler;
  }
  return streamableHttpRouter(mcp, logger);
}

/** Connect the upstream MCP server to a non-HTTP transport, e.g. stdio. */
export async function serveOverStdio(mcp: UpstreamMcp, transport: Transport): Promise<ConnectableServer> {
  if (mcp.kind === "handler") {
    throw new Error(
      `"${mcp.exportName}" from "${mcp.module.specifier}" is an HTTP handler; stdio needs an MCP server export`,
    );
  }
  const server = mcp.kind === "factory" ? mcp.create() : mcp.server;
  await server.connect(transport);
  return server;
}
