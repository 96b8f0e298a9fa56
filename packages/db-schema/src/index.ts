// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@roster/db-schema`
 * Purpose: Root barrel re-exporting all schema slices for consumers that need the full schema.
 * Scope: Re-exports only. Does not define any tables.
 * Invariants: Must re-export every slice so drizzle's relational query builder sees the full schema.
 * Side-effects: none
 * @public
 */

export * from "./refs";
export * from "./rich-info";
export * from "./teams";
