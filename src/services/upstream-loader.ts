/**
 * Upstream Loader
 *
 * Locates the upstream package's application objects. Each module is
 * resolved in two stages:
 *
 *   1. `import(specifier)` from this package's normal resolution path.
 *   2. If (and only if) that fails because the module cannot be found, the
 *      specifier is resolved once more inside the fallback directory, for
 *      installs that live outside node_modules (e.g. a git checkout baked
 *      into the image at /opt/basecamp-mcp). Within that directory a
 *      package is looked up in `node_modules/` first, then as a checkout
 *      named after the package (through its `exports` map when it has one),
 *      then as a plain path.
 *
 * A module that is found but throws while evaluating is not retried.
 */

import { createRequire } from "node:module";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";

import type { WrapperConfig } from "../config.js";
import { errorMessage, UpstreamLoadError, type LoadAttempt } from "../errors.js";
import type {
  ConnectableServer,
  LoadedModule,
  Logger,
  ResolutionSource,
  UpstreamApps,
  UpstreamHandler,
  UpstreamMcp,
  UpstreamOAuth,
} from "../types.js";

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface LoaderOptions {
  /** Replaces the native `import()`; used to simulate install layouts. */
  importer?: ModuleImporter;
  logger?: Logger;
}

export interface ImportOptions extends LoaderOptions {
  fallbackDir: string;
}

export const MCP_EXPORT_NAMES = ["createMcpServer", "mcp", "server", "app", "default"] as const;
export const OAUTH_EXPORT_NAMES = ["app", "oauth", "default"] as const;

const NOT_FOUND_CODES = new Set([
  "ERR_MODULE_NOT_FOUND",
  "MODULE_NOT_FOUND",
  "ERR_PACKAGE_PATH_NOT_EXPORTED",
]);

const moduleNamespace = z.record(z.unknown());

const require = createRequire(import.meta.url);

const nativeImport: ModuleImporter = (specifier) => import(specifier);

export function isModuleNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    typeof err.code === "string" &&
    NOT_FOUND_CODES.has(err.code)
  );
}

function isFunction(value: unknown): value is (...args: unknown[]) => unknown {
  return typeof value === "function";
}

function isHandler(value: unknown): value is UpstreamHandler {
  return typeof value === "function";
}

export function isConnectableServer(value: unknown): value is ConnectableServer {
  return (
    typeof value === "object" &&
    value !== null &&
    "connect" in value &&
    typeof value.connect === "function"
  );
}

function toLoadedModule(
  specifier: string,
  source: ResolutionSource,
  url: string,
  namespace: unknown,
): LoadedModule {
  const parsed = moduleNamespace.safeParse(namespace);
  if (!parsed.success) {
    throw new UpstreamLoadError(`Upstream module "${specifier}" did not evaluate to a module namespace`, specifier);
  }
  return { specifier, source, url, exports: parsed.data };
}

/** `@scope/name` or `name` for a bare specifier; undefined for paths and URLs. */
export function packageNameOf(specifier: string): string | undefined {
  if (specifier.startsWith(".") || specifier.startsWith("/") || specifier.includes(":")) return undefined;
  const [first, second] = specifier.split("/");
  if (!first) return undefined;
  if (first.startsWith("@")) return second ? `${first}/${second}` : undefined;
  return first;
}

/** Resolve `specifier` inside `fallbackDir` to a file URL. */
export function resolveInFallbackDir(specifier: string, fallbackDir: string): string {
  const resolvers: Array<() => string> = [];
  const packageName = packageNameOf(specifier);
  if (packageName) {
    resolvers.push(
      // fallbackDir/node_modules/<package>, as left by `npm install --prefix`
      () => require.resolve(specifier, { paths: [fallbackDir] }),
      // fallbackDir/<package> checkout referring to itself through its exports
      () => createRequire(path.join(fallbackDir, packageName, "package.json")).resolve(specifier),
    );
  }
  resolvers.push(() => require.resolve(path.resolve(fallbackDir, specifier)));

  let lastError: unknown;
  for (const resolve of resolvers) {
    try {
      return pathToFileURL(resolve()).href;
    } catch (err) {
      if (!isModuleNotFound(err)) throw err;
      lastError = err;
    }
  }
  throw lastError;
}

export async function importUpstream(specifier: string, options: ImportOptions): Promise<LoadedModule> {
  const importer = options.importer ?? nativeImport;
  const logger = options.logger ?? console;
  const attempts: LoadAttempt[] = [];

  let namespace: unknown;
  let primaryError: string | undefined;
  try {
    namespace = await importer(specifier);
  } catch (err) {
    primaryError = errorMessage(err);
    attempts.push({ source: "primary", target: specifier, error: primaryError });
    if (!isModuleNotFound(err)) {
      throw new UpstreamLoadError(
        `Upstream module "${specifier}" failed to load: ${primaryError}`,
        specifier,
        attempts,
        { cause: err },
      );
    }
  }
  if (primaryError === undefined) {
    return toLoadedModule(specifier, "primary", specifier, namespace);
  }

  // The primary error can name a missing dependency of the upstream, not the upstream itself.
  logger.warn(
    `[upstream] "${specifier}" not found on the default path (${primaryError}), retrying from ${options.fallbackDir}`,
  );

  const candidate = path.resolve(options.fallbackDir, specifier);
  let url: string;
  try {
    url = resolveInFallbackDir(specifier, options.fallbackDir);
    namespace = await importer(url);
  } catch (err) {
    attempts.push({ source: "fallback", target: candidate, error: errorMessage(err) });
    throw new UpstreamLoadError(
      `Upstream module "${specifier}" could not be imported ` +
        `(default path: ${primaryError}; ${options.fallbackDir}: ${errorMessage(err)})`,
      specifier,
      attempts,
      { cause: err },
    );
  }
  return toLoadedModule(specifier, "fallback", url, namespace);
}

export function selectMcpExport(module: LoadedModule): UpstreamMcp {
  for (const exportName of MCP_EXPORT_NAMES) {
    const value = module.exports[exportName];

    if (exportName === "createMcpServer" && isFunction(value)) {
      return {
        kind: "factory",
        exportName,
        module,
        create: () => {
          const server = value();
          if (!isConnectableServer(server)) {
            throw new UpstreamLoadError(
              `createMcpServer() from "${module.specifier}" did not return an MCP server`,
              module.specifier,
            );
          }
          return server;
        },
      };
    }
    if (isConnectableServer(value)) {
      return { kind: "server", exportName, module, server: value };
    }
    if (isHandler(value)) {
      return { kind: "handler", exportName, module, handler: value };
    }
  }

  throw new UpstreamLoadError(
    `Upstream module "${module.specifier}" exports no MCP server or request handler (looked for ${MCP_EXPORT_NAMES.join(", ")})`,
    module.specifier,
  );
}

export function selectOAuthExport(module: LoadedModule): UpstreamOAuth {
  for (const exportName of OAUTH_EXPORT_NAMES) {
    const value = module.exports[exportName];
    if (isHandler(value)) {
      return { exportName, module, handler: value };
    }
  }

  throw new UpstreamLoadError(
    `Upstream module "${module.specifier}" exports no OAuth request handler (looked for ${OAUTH_EXPORT_NAMES.join(", ")})`,
    module.specifier,
  );
}

/** Load both upstream applications. Either one missing is fatal. */
export async function loadUpstreamApps(config: WrapperConfig, options: LoaderOptions = {}): Promise<UpstreamApps> {
  const logger = options.logger ?? console;
  const importOptions: ImportOptions = { ...options, fallbackDir: config.upstream.fallbackDir };

  const mcp = selectMcpExport(await importUpstream(config.upstream.mcpModule, importOptions));
  logger.log(
    `[upstream] MCP application: "${mcp.exportName}" (${mcp.kind}) from ${mcp.module.source} ${mcp.module.url}`,
  );

  const oauth = selectOAuthExport(await importUpstream(config.upstream.oauthModule, importOptions));
  logger.log(`[upstream] OAuth application: "${oauth.exportName}" from ${oauth.module.source} ${oauth.module.url}`);

  return { mcp, oauth };
}
