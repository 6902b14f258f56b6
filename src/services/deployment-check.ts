/**
 * Deployment check
 *
 * Checks a running wrapper: GET /health must answer `{ ok: true }`, and
 * GET /debug/info reports which upstream objects were mounted.
 */

import axios from "axios";
import { z } from "zod";

const healthSchema = z.object({ ok: z.literal(true) });

const mountSchema = z.object({
  module: z.string(),
  source: z.enum(["primary", "fallback"]),
  export: z.string(),
  mountedAt: z.string(),
});

const debugInfoSchema = z.object({
  mcp: mountSchema.extend({ kind: z.enum(["handler", "server", "factory"]) }),
  oauth: mountSchema,
});

export type DebugInfo = z.infer<typeof debugInfoSchema>;

export type DeploymentCheckResult =
  | { ok: true; baseUrl: string; info: DebugInfo }
  | { ok: false; baseUrl: string; error: string; status?: number };

export async function checkDeployment(baseUrl: string, timeoutMs = 10_000): Promise<DeploymentCheckResult> {
  const base = baseUrl.replace(/\/+$/, "");

  try {
    const health = await axios.get<unknown>(`${base}/health`, {
      timeout: timeoutMs,
      validateStatus: () => true,
    });
    if (health.status >= 400) {
      return { ok: false, baseUrl: base, error: `GET /health returned HTTP ${health.status}`, status: health.status };
    }
    if (!healthSchema.safeParse(health.data).success) {
      return { ok: false, baseUrl: base, error: "GET /health did not report ok" };
    }

    const debug = await axios.get<unknown>(`${base}/debug/info`, {
      timeout: timeoutMs,
      validateStatus: () => true,
    });
    if (debug.status >= 400) {
      return { ok: false, baseUrl: base, error: `GET /debug/info returned HTTP ${debug.status}`, status: debug.status };
    }
    const info = debugInfoSchema.safeParse(debug.data);
    if (!info.success) {
      return { ok: false, baseUrl: base, error: "GET /debug/info returned an unexpected body" };
    }

    return { ok: true, baseUrl: base, info: info.data };
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    return { ok: false, baseUrl: base, error: message };
  }
}
