/**
 * Wrapper configuration
 *
 * The environment is parsed once at startup into a frozen WrapperConfig and
 * passed explicitly to everything that needs it. Credential values are not
 * validated here; the upstream package checks them when the OAuth flow runs.
 */

import path from "node:path";
import { z } from "zod";

import { ConfigError } from "./errors.js";

export type Env = Record<string, string | undefined>;

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = "0.0.0.0";
export const OAUTH_CALLBACK_PATH = "/oauth/callback";

export interface UpstreamLocations {
  /** Module specifier of the upstream MCP application. */
  readonly mcpModule: string;
  /** Module specifier of the upstream OAuth application. */
  readonly oauthModule: string;
  readonly tokenStorageModule: string;
  /** Searched once when a specifier cannot be imported normally. */
  readonly fallbackDir: string;
}

export interface WrapperConfig {
  readonly clientId?: string;
  readonly clientSecret?: string;
  readonly accountId?: string;
  readonly userAgent?: string;
  readonly publicBaseUrl?: string;
  readonly redirectUri?: string;
  readonly tokenDir: string;
  readonly tokenFilename: string;
  readonly tokenFile: string;
  readonly host: string;
  readonly port: number;
  readonly upstream: UpstreamLocations;
}

// Unset and empty are the same thing, as with `${PORT:-8000}` in a shell.
const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());
const stringOr = (fallback: string) =>
  z.preprocess(emptyToUndefined, z.string().default(fallback));

const envSchema = z.object({
  BASECAMP_CLIENT_ID: optionalString,
  BASECAMP_CLIENT_SECRET: optionalString,
  BASECAMP_ACCOUNT_ID: optionalString,
  BASECAMP_REDIRECT_URI: optionalString,
  USER_AGENT: optionalString,
  PUBLIC_BASE_URL: optionalString,
  TOKEN_DIR: stringOr("/app/data"),
  TOKEN_FILENAME: stringOr("oauth_tokens.json"),
  PORT: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().min(1).max(65_535).default(DEFAULT_PORT),
  ),
  UPSTREAM_MCP_MODULE: stringOr("basecamp-mcp-server/mcp"),
  UPSTREAM_OAUTH_MODULE: stringOr("basecamp-mcp-server/oauth"),
  UPSTREAM_TOKEN_STORAGE_MODULE: stringOr("basecamp-mcp-server/token-storage"),
  UPSTREAM_FALLBACK_DIR: stringOr("/opt/basecamp-mcp"),
});

/**
 * Callback URL registered with Basecamp, derived from the public base URL.
 * Trailing slashes are dropped so the result never contains `//oauth`.
 */
export function deriveRedirectUri(publicBaseUrl: string): string {
  return `${publicBaseUrl.replace(/\/+$/, "")}${OAUTH_CALLBACK_PATH}`;
}

export function loadConfig(env: Env = process.env): WrapperConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const vars = parsed.data;

  const redirectUri =
    vars.BASECAMP_REDIRECT_URI ??
    (vars.PUBLIC_BASE_URL ? deriveRedirectUri(vars.PUBLIC_BASE_URL) : undefined);

  return Object.freeze({
    clientId: vars.BASECAMP_CLIENT_ID,
    clientSecret: vars.BASECAMP_CLIENT_SECRET,
    accountId: vars.BASECAMP_ACCOUNT_ID,
    userAgent: vars.USER_AGENT,
    publicBaseUrl: vars.PUBLIC_BASE_URL,
    redirectUri,
    tokenDir: vars.TOKEN_DIR,
    tokenFilename: vars.TOKEN_FILENAME,
    tokenFile: path.join(vars.TOKEN_DIR, vars.TOKEN_FILENAME),
    host: DEFAULT_HOST,
    port: vars.PORT,
    upstream: Object.freeze({
      mcpModule: vars.UPSTREAM_MCP_MODULE,
      oauthModule: vars.UPSTREAM_OAUTH_MODULE,
      tokenStorageModule: vars.UPSTREAM_TOKEN_STORAGE_MODULE,
      fallbackDir: vars.UPSTREAM_FALLBACK_DIR,
    }),
  });
}

/**
 * The upstream package reads its settings from the environment when it is
 * imported. Fill in the values the wrapper resolved or derived, without
 * overwriting anything already set. Returns the names that were written.
 */
export function forwardUpstreamEnvironment(config: WrapperConfig, env: Env = process.env): string[] {
  const forwarded: Array<[string, string | undefined]> = [
    ["BASECAMP_REDIRECT_URI", config.redirectUri],
    ["TOKEN_DIR", config.tokenDir],
    ["TOKEN_FILENAME", config.tokenFilename],
  ];

  const written: string[] = [];
  for (const [name, value] of forwarded) {
    if (value !== undefined && !env[name]) {
      env[name] = value;
      written.push(name);
    }
  }
  return written;
}

export function listenOptions(config: WrapperConfig): { host: string; port: number } {
  return { host: config.host, port: config.port };
}

export function configWarnings(config: WrapperConfig): string[] {
  const warnings: string[] = [];
  if (!config.clientId || !config.clientSecret) {
    warnings.push("BASECAMP_CLIENT_ID and BASECAMP_CLIENT_SECRET are required for the OAuth flow");
  }
  if (!config.redirectUri) {
    warnings.push("neither BASECAMP_REDIRECT_URI nor PUBLIC_BASE_URL is set; the OAuth callback URL is unknown");
  }
  return warnings;
}
