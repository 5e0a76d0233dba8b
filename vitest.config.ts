// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@chargewatch/monitor": fileURLToPath(new URL("./packages/monitor/src/index.ts", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/unit/**/*.test.ts"],
    env: {
      CHARGEWATCH_LOG_LEVEL: "silent",
    },
    coverage: {
      provider: "v8",
      include: ["packages/monitor/src/**"],
      exclude: ["packages/monitor/src/sources/system.ts"],
      reporter: ["text", "lcov"],
    },
  },
});
