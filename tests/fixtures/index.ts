import { fileURLToPath } from "node:url";
import { vi } from "vitest";

import type { Logger } from "../../src/types.js";

export type FixtureName =
  | "upstream-mcp"
  | "upstream-mcp-instance"
  | "upstream-mcp-handler"
  | "upstream-oauth"
  | "upstream-token-storage"
  | "upstream-broken"
  | "upstream-empty";

/** File URL of a fixture module, usable as an upstream module specifier. */
export function fixtureUrl(name: FixtureName): string {
  return new URL(`./${name}.ts`, import.meta.url).href;
}

/** Directory laid out like an out-of-tree install of the upstream package. */
export const vendorDir = fileURLToPath(new URL("./vendor", import.meta.url));

/** Checkout whose package.json maps `./mcp` and `./oauth` through `exports`. */
export const vendorExportsDir = fileURLToPath(new URL("./vendor-exports", import.meta.url));

/** Layout left by `npm install --prefix`: the package under node_modules/. */
export const vendorPrefixDir = fileURLToPath(new URL("./vendor-prefix", import.meta.url));

/**
 * Importer for a process where the upstream package is not installed:
 * bare specifiers fail the way Node reports a missing package, file URLs
 * load normally.
 */
export async function notInstalledImporter(specifier: string): Promise<unknown> {
  if (!specifier.startsWith("file:")) {
    throw Object.assign(new Error(`Cannot find package '${specifier}'`), { code: "ERR_MODULE_NOT_FOUND" });
  }
  return import(specifier);
}

export function silentLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}
