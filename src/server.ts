#!/usr/bin/env node

/**
 * Basecamp MCP Wrapper — Express Server
 *
 * Mounts the upstream Basecamp MCP server at /mcp and its OAuth flow at
 * /oauth in a single process. Refuses to start if either upstream app
 * cannot be loaded.
 */

import "dotenv/config";

import { bootstrap } from "./bootstrap.js";
import { listenOptions } from "./config.js";

async function main() {
  const { app, config } = await bootstrap(process.env);
  const { host, port } = listenOptions(config);

  app.listen(port, host, () => {
    const base = config.publicBaseUrl?.replace(/\/+$/, "") ?? `http://${host}:${port}`;
    console.log(`\n  Basecamp MCP wrapper listening on http://${host}:${port}`);
    console.log(`  MCP endpoint:   ${base}/mcp`);
    console.log(`  OAuth start:    ${base}/oauth/start`);
    console.log(`  Token file:     ${config.tokenFile}\n`);
  });
}

main().catch((error) => {
  console.error("[startup] Failed to start:", error);
  process.exit(1);
});
