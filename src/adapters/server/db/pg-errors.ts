// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/pg-errors`
 * Purpose: Classify PostgreSQL errors surfaced by postgres.js by SQLSTATE.
 * Scope: Pure predicates. Does not log or rethrow.
 * Invariants: Looks at `code` on the error and on its `cause` (drizzle may wrap driver errors).
 * Side-effects: none
 * @internal
 */

const FOREIGN_KEY_VIOLATION = "23503";

function sqlState(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("code" in error && typeof error.code === "string") return error.code;
  if ("cause" in error) return sqlState(error.cause);
  return undefined;
}

export function isForeignKeyViolation(error: unknown): boolean {
  return sqlState(error) === FOREIGN_KEY_VIOLATION;
}
