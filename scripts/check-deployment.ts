#!/usr/bin/env node

/**
 * check-deployment.ts
 *
 * Smoke-checks a deployed wrapper: /health answers and /debug/info shows
 * both upstream apps mounted.
 *
 * Usage:
 *   npx tsx scripts/check-deployment.ts https://basecamp-mcp.example.com
 *   PUBLIC_BASE_URL=https://basecamp-mcp.example.com npx tsx scripts/check-deployment.ts
 */

import "dotenv/config";

import { checkDeployment } from "../src/services/deployment-check.js";

async function main() {
  const baseUrl = process.argv[2] ?? process.env.PUBLIC_BASE_URL;
  if (!baseUrl) {
    console.error("Usage: check-deployment.ts <base-url>  (or set PUBLIC_BASE_URL)");
    process.exit(2);
  }

  const result = await checkDeployment(baseUrl);
  console.log(JSON.stringify(result, null, 2));
  if (!result.ok) {
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("check-deployment failed:", error);
  process.exit(1);
});
