// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest configuration for unit, contract, port and in-process HTTP tests.
 * Scope: One run covers the whole tree; nothing here needs a database or network.
 * Invariants: Coverage disabled by default; APP_ENV=test wiring comes from tests/setup.ts.
 * Side-effects: file system (coverage reports written to ./coverage/ when enabled)
 * Notes: vite-tsconfig-paths resolves the `@/*` aliases; `@tests` is aliased here.
 * @public
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist", "tests/_fakes/**", "tests/_fixtures/**"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
      exclude: ["node_modules/", "tests/", "dist/", "**/*.config.*"],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
  plugins: [tsconfigPaths()],
  resolve: {
    alias: {
      "@tests": path.resolve(__dirname, "./tests"),
    },
  },
});
