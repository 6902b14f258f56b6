#!/usr/bin/env node

/**
 * MCP Server — stdio transport
 *
 * Serves the upstream MCP server over stdio for local testing with the MCP
 * Inspector, Cursor, Claude Desktop, or any stdio-based MCP client. Needs
 * an upstream that exports an MCP server or `createMcpServer`.
 *
 * Usage:
 *   npx tsx src/mcp-stdio.ts
 *   npx @modelcontextprotocol/inspector npx tsx src/mcp-stdio.ts
 */

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { forwardUpstreamEnvironment, loadConfig } from "./config.js";
import { serveOverStdio } from "./mcp.js";
import { configureTokenStorage, prepareTokenStorage } from "./services/token-storage.js";
import { importUpstream, selectMcpExport } from "./services/upstream-loader.js";
import type { Logger } from "./types.js";

// stdout carries protocol frames; everything else goes to stderr.
const logger: Logger = { log: console.error, warn: console.error, error: console.error };

async function main() {
  const config = loadConfig(process.env);
  forwardUpstreamEnvironment(config, process.env);
  await prepareTokenStorage(config);
  await configureTokenStorage(config, { logger });

  const module = await importUpstream(config.upstream.mcpModule, {
    fallbackDir: config.upstream.fallbackDir,
    logger,
  });
  await serveOverStdio(selectMcpExport(module), new StdioServerTransport());
  logger.log(`[stdio] Serving "${config.upstream.mcpModule}" over stdio`);
}

main().catch((error) => {
  console.error("[stdio] Failed to start:", error);
  process.exit(1);
});
