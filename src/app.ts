/**
 * Composition root
 *
 * Builds the single Express app that is served by the process:
 *
 *   GET /            — liveness
 *   GET /health      — platform health check
 *   GET /debug/info  — what was mounted, and from where
 *   /mcp             — upstream MCP application
 *   /oauth           — upstream OAuth flow (/oauth/start, /oauth/callback)
 *
 * Composition is synchronous and performs no I/O. Errors raised by the
 * mounted upstream apps are left to them and to Express.
 */

import express from "express";

import { mcpRouter } from "./mcp.js";
import { requestLog } from "./middleware/request-log.js";
import type { LoadedModule, Logger, UpstreamApps } from "./types.js";

export const SERVICE_NAME = "basecamp-mcp-wrapper";
export const MCP_PREFIX = "/mcp";
export const OAUTH_PREFIX = "/oauth";

export interface ComposeOptions {
  logger?: Logger;
}

function describeModule(module: LoadedModule) {
  return {
    module: module.specifier,
    source: module.source,
    url: module.url,
    exports: Object.keys(module.exports).sort(),
  };
}

export function describeUpstream(upstream: UpstreamApps) {
  return {
    mcp: {
      ...describeModule(upstream.mcp.module),
      export: upstream.mcp.exportName,
      kind: upstream.mcp.kind,
      mountedAt: MCP_PREFIX,
    },
    oauth: {
      ...describeModule(upstream.oauth.module),
      export: upstream.oauth.exportName,
      mountedAt: OAUTH_PREFIX,
    },
  };
}

export function composeApp(upstream: UpstreamApps, options: ComposeOptions = {}): express.Express {
  const logger = options.logger ?? console;
  const app = express();

  app.disable("x-powered-by");
  app.use(requestLog(logger));

  // ── Wrapper routes ──────────────────────────────────────────────────────

  app.get("/", (_req, res) => {
    res.json({ status: "ok", service: SERVICE_NAME });
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/debug/info", (_req, res) => {
    res.json(describeUpstream(upstream));
  });

  // ── Upstream mounts ─────────────────────────────────────────────────────

  app.use(MCP_PREFIX, mcpRouter(upstream.mcp, logger));
  app.use(OAUTH_PREFIX, upstream.oauth.handler);

  return app;
}
