// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@roster/db-schema/refs`
 * Purpose: FK target tables, canonical home for tables referenced across domain slices.
 * Scope: Defines users and teams tables only. Does not contain domain-specific tables.
 * Invariants:
 * - This is the ROOT of the schema DAG, imports nothing from other slices
 * - All cross-slice FK references point to tables defined here
 * - Rows are written by the provisioning service; this service only reads them
 * Side-effects: none (schema definitions only)
 * @public
 */

import { pgTable, text, timestamp } from "drizzle-orm/pg-core";

/**
 * Users table. FK target for: teamMembers, richInfo
 */
export const users = pgTable("users", {
  id: text("id").primaryKey(),
  name: text("name"),
  email: text("email").unique(),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

/**
 * Teams table. FK target for: teamMembers
 */
export const teams = pgTable("teams", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  creatorUserId: text("creator_user_id")
    .notNull()
    .references(() => users.id),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});
