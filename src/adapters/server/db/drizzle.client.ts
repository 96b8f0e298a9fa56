// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle.client`
 * Purpose: Drizzle database client configuration and connection management.
 * Scope: Database connection setup and Drizzle ORM instance. Does not handle business logic or migrations.
 * Invariants: Single database connection instance; configured with the full schema; lazy initialization
 * Side-effects: IO (database connections) - only on first access
 * Notes: Uses postgres driver with Drizzle ORM; connection string from runtime environment; never touched when APP_ENV=test wires in-memory adapters
 * Links: Used by database adapters for queries
 * @internal
 */

import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schema from "@/shared/db/schema";
import { serverEnv } from "@/shared/env";

// Schema-aware database type
export type Database = PostgresJsDatabase<typeof schema>;

let _db: Database | null = null;
let _client: ReturnType<typeof postgres> | null = null;

function createDb(): Database {
  if (!_db) {
    const env = serverEnv();
    const client = postgres(env.DATABASE_URL, {
      max: 10,
      idle_timeout: 20,
      connect_timeout: 10,
      connection: {
        application_name: env.SERVICE_NAME,
      },
    });

    _client = client;
    _db = drizzle(client, { schema });
  }
  return _db;
}

// Lazy getter to avoid top-level runtime env access
export const getDb = createDb;

/**
 * Drain the pool on shutdown. No-op when no client was created.
 */
export async function closeDb(): Promise<void> {
  const client = _client;
  _client = null;
  _db = null;
  if (client) {
    await client.end({ timeout: 5 });
  }
}
