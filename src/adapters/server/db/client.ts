// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db`
 * Purpose: Database adapter entry point for server-side database access.
 * Scope: Re-exports database client getter and types. Does not contain implementation logic.
 * Invariants: Clean entry point for database access
 * Side-effects: none (re-exports only)
 * Links: Used by drizzle adapters and the container
 * @public
 */

export { closeDb, type Database, getDb } from "./drizzle.client";
