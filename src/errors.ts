import type { ResolutionSource } from "./types.js";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export interface LoadAttempt {
  source: ResolutionSource;
  target: string;
  error: string;
}

/**
 * Raised when an upstream module cannot be imported or does not export a
 * usable application object. Startup treats it as fatal.
 */
export class UpstreamLoadError extends Error {
  constructor(
    message: string,
    readonly specifier: string,
    readonly attempts: LoadAttempt[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "UpstreamLoadError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
