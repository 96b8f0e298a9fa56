// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `drizzle.config`
 * Purpose: drizzle-kit configuration for migration generation and application.
 * Scope: Schema path and credentials. Does not handle runtime connections.
 * Invariants: Schema path points at the db-schema workspace package.
 * Side-effects: IO (file system operations during migration generation)
 * Links: npm run db:generate, npm run db:migrate
 * @public
 */

import { defineConfig } from "drizzle-kit";

import { buildDatabaseUrl } from "./src/shared/db/db-url";

function getDatabaseUrl(): string {
  if (process.env.DATABASE_URL) {
    return process.env.DATABASE_URL;
  }
  return buildDatabaseUrl(process.env);
}

export default defineConfig({
  schema: "./packages/db-schema/src/index.ts",
  out: "./src/adapters/server/db/migrations",
  dialect: "postgresql",
  dbCredentials: {
    url: getDatabaseUrl(),
  },
  verbose: true,
  strict: true,
});
