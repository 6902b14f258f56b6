/**
 * Startup sequence, shared by the HTTP server and the tests.
 *
 * Order matters: the upstream package reads its environment when it is
 * imported, so derived values are forwarded before anything upstream loads.
 */

import type express from "express";

import { composeApp } from "./app.js";
import { configWarnings, forwardUpstreamEnvironment, loadConfig, type Env, type WrapperConfig } from "./config.js";
import { loadUpstreamApps, type ModuleImporter } from "./services/upstream-loader.js";
import { configureTokenStorage, prepareTokenStorage } from "./services/token-storage.js";
import type { Logger, UpstreamApps } from "./types.js";

export interface BootstrapOptions {
  importer?: ModuleImporter;
  logger?: Logger;
}

export interface Bootstrapped {
  app: express.Express;
  config: WrapperConfig;
  upstream: UpstreamApps;
}

export async function bootstrap(env: Env = process.env, options: BootstrapOptions = {}): Promise<Bootstrapped> {
  const logger = options.logger ?? console;
  const config = loadConfig(env);

  for (const warning of configWarnings(config)) {
    logger.warn(`[startup] ${warning}`);
  }

  const forwarded = forwardUpstreamEnvironment(config, env);
  if (forwarded.length > 0) {
    logger.log(`[startup] Forwarded to upstream: ${forwarded.join(", ")}`);
  }
  if (config.redirectUri) {
    logger.log(`[startup] OAuth redirect URI: ${config.redirectUri}`);
  }

  await prepareTokenStorage(config);
  await configureTokenStorage(config, options);

  const upstream = await loadUpstreamApps(config, options);
  const app = composeApp(upstream, { logger });

  return { app, config, upstream };
}
