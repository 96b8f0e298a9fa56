// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@roster/db-schema/rich-info`
 * Purpose: Per-user rich info storage, one row holding the complete ordered field list.
 * Scope: Defines rich_info. Does not validate field contents.
 * Invariants:
 * - ONE_ROW_PER_USER: user_id is the primary key; writes upsert the whole row (full replace, never merge).
 * - FIELDS_ORDERED: fields is a JSONB array; element order is the user's field order.
 * - ABSENT_ROW_IS_EMPTY: readers treat a missing row as an empty field list.
 * Side-effects: none (schema definitions only)
 * @public
 */

import { jsonb, pgTable, text, timestamp } from "drizzle-orm/pg-core";

import { users } from "./refs";

/** Stored shape of a single field. Kept structural so the schema slice stays domain-free. */
export interface RichFieldRow {
  name: string;
  value: string;
}

export const richInfo = pgTable("rich_info", {
  userId: text("user_id")
    .primaryKey()
    .references(() => users.id, { onDelete: "cascade" }),
  fields: jsonb("fields").$type<RichFieldRow[]>().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});
