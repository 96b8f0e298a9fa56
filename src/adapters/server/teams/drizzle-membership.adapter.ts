// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/teams/drizzle-membership`
 * Purpose: PostgreSQL implementation of TeamMembershipReader.
 * Scope: Reads team_members by user. Does not write memberships or read permissions.
 * Invariants:
 *   - UNIQUE(user_id) in team_members, so at most one row matches
 *   - A team_id that is not a UUID counts as no membership, so the gate denies
 * Side-effects: IO (database reads)
 * Links: Implements TeamMembershipReader port, @roster/db-schema/teams
 * @public
 */

import { parseTeamId, type TeamId, type UserId } from "@roster/ids";
import { eq } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import type { TeamMembershipReader } from "@/ports";
import { teamMembers } from "@/shared/db";

export class DrizzleTeamMembershipReader implements TeamMembershipReader {
  constructor(private readonly db: Database) {}

  async getUserTeam(userId: UserId): Promise<TeamId | null> {
    const row = await this.db.query.teamMembers.findFirst({
      where: eq(teamMembers.userId, userId),
      columns: { teamId: true },
    });
    return row ? parseTeamId(row.teamId) : null;
  }
}
