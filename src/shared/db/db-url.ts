// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/db-url`
 * Purpose: Build a PostgreSQL connection string from discrete env pieces.
 * Scope: Pure string construction for app runtime and drizzle-kit. Does not connect or read process.env.
 * Invariants: Requires user, password, database and host; credentials are percent-encoded.
 * Side-effects: none
 * Links: shared/env/server.ts, drizzle.config.ts
 * @public
 */

export interface DbEnvInput {
  POSTGRES_USER?: string | undefined;
  POSTGRES_PASSWORD?: string | undefined;
  POSTGRES_DB?: string | undefined;
  DB_HOST?: string | undefined;
  DB_PORT?: string | number | undefined;
}

export function buildDatabaseUrl(env: DbEnvInput): string {
  const { POSTGRES_USER: user, POSTGRES_PASSWORD: password } = env;
  const { POSTGRES_DB: database, DB_HOST: host } = env;
  const port =
    typeof env.DB_PORT === "number" ? env.DB_PORT : Number(env.DB_PORT ?? 5432);

  if (!user || !password || !database || !host) {
    throw new TypeError(
      "Missing DB env vars: POSTGRES_USER, POSTGRES_PASSWORD, POSTGRES_DB and DB_HOST are all required"
    );
  }

  if (!Number.isInteger(port) || port <= 0) {
    throw new TypeError(`Invalid DB_PORT value: ${env.DB_PORT}`);
  }

  return `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${host}:${port}/${database}`;
}
