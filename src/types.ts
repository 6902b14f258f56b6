import type { IncomingMessage, ServerResponse } from "node:http";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

// ── Upstream contract ───────────────────────────────────────────────────

/**
 * A Node request listener or Express-style app exported by the upstream
 * package. Express mounts it under a prefix and strips that prefix from
 * `req.url` before calling it.
 */
export type UpstreamHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  next?: (err?: unknown) => void,
) => unknown;

/** Anything that speaks MCP over a transport, e.g. the SDK's `McpServer`. */
export interface ConnectableServer {
  connect(transport: Transport): Promise<void>;
}

export type McpServerFactory = () => ConnectableServer;

/** Where an upstream module was finally imported from. */
export type ResolutionSource = "primary" | "fallback";

export interface LoadedModule {
  specifier: string;
  source: ResolutionSource;
  /** The URL or specifier handed to `import()` on the successful attempt. */
  url: string;
  exports: Record<string, unknown>;
}

export type UpstreamMcp = { exportName: string; module: LoadedModule } & (
  | { kind: "handler"; handler: UpstreamHandler }
  | { kind: "server"; server: ConnectableServer }
  | { kind: "factory"; create: McpServerFactory }
);

export interface UpstreamOAuth {
  exportName: string;
  module: LoadedModule;
  handler: UpstreamHandler;
}

export interface UpstreamApps {
  mcp: UpstreamMcp;
  oauth: UpstreamOAuth;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;
