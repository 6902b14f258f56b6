/**
 * Vitest configuration.
 *
 * Tests compose the Express app in-process and drive it with supertest;
 * nothing binds a port. Upstream stand-ins live under tests/fixtures.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 15_000,
  },
});
