// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@roster/db-schema/teams`
 * Purpose: Team membership table linking users to the team they belong to.
 * Scope: Defines team_members. Does not contain queries or permission logic.
 * Invariants:
 * - ONE_TEAM_PER_USER: UNIQUE(user_id), a user belongs to at most one team.
 * - PERMISSIONS_OPAQUE: permissions is a bitmask owned by the provisioning service; visibility never reads it.
 * Side-effects: none (schema definitions only)
 * @public
 */

import {
  bigint,
  index,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

import { teams, users } from "./refs";

export const teamMembers = pgTable(
  "team_members",
  {
    teamId: text("team_id")
      .notNull()
      .references(() => teams.id, { onDelete: "cascade" }),
    userId: text("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    permissions: bigint("permissions", { mode: "bigint" }).notNull().default(0n),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex("team_members_user_id_unique").on(table.userId),
    index("team_members_team_id_idx").on(table.teamId),
  ]
);
