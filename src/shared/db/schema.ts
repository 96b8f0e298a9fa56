// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema`
 * Purpose: App-side view of the database schema, sourced from @roster/db-schema.
 * Scope: Re-exports tables. Does not define tables locally.
 * Invariants: The namespace import of this module is the schema handed to drizzle().
 * Side-effects: none
 * Links: packages/db-schema, drizzle.config.ts
 * @public
 */

export * from "@roster/db-schema";
