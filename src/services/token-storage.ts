/**
 * Token storage setup
 *
 * The upstream OAuth code owns the token file. All the wrapper does is make
 * sure its directory exists (normally a mounted volume) and, when the
 * upstream token-storage module offers a `setTokenFile` hook, point it at
 * `{TOKEN_DIR}/{TOKEN_FILENAME}` so tokens survive restarts.
 */

import { mkdir } from "node:fs/promises";

import type { WrapperConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { importUpstream, type LoaderOptions } from "./upstream-loader.js";

type TokenFileSetter = (tokenFile: string) => unknown;

function isTokenFileSetter(value: unknown): value is TokenFileSetter {
  return typeof value === "function";
}

export async function prepareTokenStorage(config: WrapperConfig): Promise<string> {
  await mkdir(config.tokenDir, { recursive: true });
  return config.tokenFile;
}

/**
 * Best effort: a missing module or hook only logs a warning, since the
 * upstream may read TOKEN_DIR/TOKEN_FILENAME from the environment itself.
 */
export async function configureTokenStorage(
  config: WrapperConfig,
  options: LoaderOptions = {},
): Promise<boolean> {
  const logger = options.logger ?? console;
  try {
    const module = await importUpstream(config.upstream.tokenStorageModule, {
      ...options,
      fallbackDir: config.upstream.fallbackDir,
    });
    const setTokenFile = module.exports.setTokenFile;
    if (!isTokenFileSetter(setTokenFile)) {
      logger.warn(`[token-storage] "${module.specifier}" has no setTokenFile(); leaving its default path`);
      return false;
    }
    await setTokenFile(config.tokenFile);
    logger.log(`[token-storage] Token storage configured at: ${config.tokenFile}`);
    return true;
  } catch (err) {
    logger.warn(`[token-storage] Could not configure token storage: ${errorMessage(err)}`);
    return false;
  }
}
