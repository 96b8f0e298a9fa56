// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/team-membership`
 * Purpose: Read-only view of team membership, owned by the provisioning service.
 * Scope: Resolves which team a user belongs to. Does not create teams, members or permissions.
 * Invariants: A user belongs to at most one team; unknown users resolve to null (no error).
 * Side-effects: none (interface definition only)
 * Links: Implemented by DrizzleTeamMembershipReader, InMemoryTeamMembership
 * @public
 */

import type { TeamId, UserId } from "@roster/ids";

export interface TeamMembershipReader {
  getUserTeam(userId: UserId): Promise<TeamId | null>;
}
