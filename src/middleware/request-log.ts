/**
 * Access log
 *
 * One line per request once the response has been sent:
 *
 *   [http] GET /mcp 200 12ms
 *
 * `originalUrl` is used so requests handled by the mounted upstream apps
 * are logged with their full path, not the prefix-stripped one they see.
 */

import type { Request, Response, NextFunction } from "express";

import type { Logger } from "../types.js";

type MiddlewareFn = (req: Request, res: Response, next: NextFunction) => void;

export function formatAccessLine(method: string, url: string, status: number, durationMs: number): string {
  return `[http] ${method} ${url} ${status} ${Math.round(durationMs)}ms`;
}

export function requestLog(logger: Pick<Logger, "log"> = console): MiddlewareFn {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = process.hrtime.bigint();

    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - started) / 1_000_000;
      logger.log(formatAccessLine(req.method, req.originalUrl, res.statusCode, durationMs));
    });

    next();
  };
}
