// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rich-info/access`
 * Purpose: Team-scoped visibility gate for rich info.
 * Scope: Pure decisions from already-resolved team memberships. Does not look memberships up.
 * Invariants:
 *   - Read allowed iff target has a team AND caller's team equals it
 *   - Permission level inside the team never matters; social connections never substitute for membership
 *   - Public write is always a self-write (the route never takes a target), allowed iff caller has a team
 * Side-effects: none
 * Links: features/rich-info/services
 * @public
 */

import type { TeamId } from "@roster/ids";

import { RichInfoAccessDeniedError, type RichInfoDenyReason } from "./errors";

export type RichInfoAccessDecision =
  | { allowed: true; teamId: TeamId }
  | { allowed: false; reason: RichInfoDenyReason };

export function decideReadAccess(params: {
  callerTeam: TeamId | null;
  targetTeam: TeamId | null;
}): RichInfoAccessDecision {
  const { callerTeam, targetTeam } = params;
  if (targetTeam === null) {
    return { allowed: false, reason: "TARGET_NOT_IN_TEAM" };
  }
  if (callerTeam !== targetTeam) {
    return { allowed: false, reason: "CALLER_NOT_IN_TARGET_TEAM" };
  }
  return { allowed: true, teamId: targetTeam };
}

export function decideSelfWriteAccess(params: {
  callerTeam: TeamId | null;
}): RichInfoAccessDecision {
  if (params.callerTeam === null) {
    return { allowed: false, reason: "CALLER_NOT_IN_TEAM" };
  }
  return { allowed: true, teamId: params.callerTeam };
}

/**
 * Throwing form used by feature services.
 *
 * @throws {@link RichInfoAccessDeniedError} When the decision is a denial
 */
export function ensureAllowed(decision: RichInfoAccessDecision): TeamId {
  if (!decision.allowed) {
    throw new RichInfoAccessDeniedError(decision.reason);
  }
  return decision.teamId;
}
