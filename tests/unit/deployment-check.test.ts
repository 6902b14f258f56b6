import axios, { AxiosHeaders, type AxiosResponse } from "axios";
import { afterEach, describe, it, expect, vi } from "vitest";

import { checkDeployment } from "../../src/services/deployment-check.js";

function reply(status: number, data: unknown): AxiosResponse {
  return { status, data, statusText: "", headers: {}, config: { headers: new AxiosHeaders() } };
}

const debugInfo = {
  mcp: {
    module: "basecamp-mcp-server/mcp",
    source: "primary",
    url: "basecamp-mcp-server/mcp",
    exports: ["createMcpServer"],
    export: "createMcpServer",
    kind: "factory",
    mountedAt: "/mcp",
  },
  oauth: {
    module: "basecamp-mcp-server/oauth",
    source: "fallback",
    url: "file:///opt/basecamp-mcp/basecamp-mcp-server/oauth.js",
    exports: ["app"],
    export: "app",
    mountedAt: "/oauth",
  },
};

describe("checkDeployment", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports both mounts of a healthy deployment", async () => {
    const get = vi
      .spyOn(axios, "get")
      .mockResolvedValueOnce(reply(200, { ok: true }))
      .mockResolvedValueOnce(reply(200, debugInfo));

    const result = await checkDeployment("https://wrapper.example.com/");

    expect(get).toHaveBeenNthCalledWith(1, "https://wrapper.example.com/health", expect.objectContaining({ timeout: 10_000 }));
    expect(get).toHaveBeenNthCalledWith(2, "https://wrapper.example.com/debug/info", expect.objectContaining({ timeout: 10_000 }));
    expect(result).toEqual({
      ok: true,
      baseUrl: "https://wrapper.example.com",
      info: {
        mcp: {
          module: "basecamp-mcp-server/mcp",
          source: "primary",
          export: "createMcpServer",
          kind: "factory",
          mountedAt: "/mcp",
        },
        oauth: {
          module: "basecamp-mcp-server/oauth",
          source: "fallback",
          export: "app",
          mountedAt: "/oauth",
        },
      },
    });
  });

  it("fails on an unhealthy status", async () => {
    const get = vi.spyOn(axios, "get").mockResolvedValueOnce(reply(503, "Service Unavailable"));

    const result = await checkDeployment("https://wrapper.example.com");

    expect(result).toEqual({
      ok: false,
      baseUrl: "https://wrapper.example.com",
      error: "GET /health returned HTTP 503",
      status: 503,
    });
    expect(get).toHaveBeenCalledTimes(1);
  });

  it("fails when /health does not report ok", async () => {
    vi.spyOn(axios, "get").mockResolvedValueOnce(reply(200, { ok: false }));

    const result = await checkDeployment("https://wrapper.example.com");

    expect(result).toEqual({ ok: false, baseUrl: "https://wrapper.example.com", error: "GET /health did not report ok" });
  });

  it("fails when the debug info is not a wrapper's", async () => {
    vi.spyOn(axios, "get")
      .mockResolvedValueOnce(reply(200, { ok: true }))
      .mockResolvedValueOnce(reply(200, { name: "something else" }));

    const result = await checkDeployment("https://wrapper.example.com");

    expect(result).toEqual({
      ok: false,
      baseUrl: "https://wrapper.example.com",
      error: "GET /debug/info returned an unexpected body",
    });
  });

  it("reports network errors", async () => {
    vi.spyOn(axios, "get").mockRejectedValueOnce(new Error("connect ECONNREFUSED 127.0.0.1:8000"));

    const result = await checkDeployment("http://127.0.0.1:8000");

    expect(result).toEqual({
      ok: false,
      baseUrl: "http://127.0.0.1:8000",
      error: "connect ECONNREFUSED 127.0.0.1:8000",
    });
  });
});
