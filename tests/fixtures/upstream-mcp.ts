import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

export const PROJECTS = [
  { id: 101, name: "Website relaunch", status: "active" },
  { id: 102, name: "Q3 planning", status: "archived" },
];

export function createMcpServer(): McpServer {
  const server = new McpServer(
    { name: "basecamp-fixture", version: "0.0.1" },
    { capabilities: { tools: {} } },
  );

  server.tool(
    "list_projects",
    "List Basecamp projects",
    { status: z.enum(["active", "archived"]).optional() },
    async ({ status }): Promise<CallToolResult> => ({
      content: [
        {
          type: "text",
          text: JSON.stringify(PROJECTS.filter((p) => !status || p.status === status)),
        },
      ],
    }),
  );

  return server;
}
