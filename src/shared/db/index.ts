// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db`
 * Purpose: Database schema and connection-string helpers for server code.
 * Scope: Re-exports only. Does not open connections.
 * Invariants: none
 * Side-effects: none
 * @public
 */

export * from "./db-url";
export * from "./schema";
