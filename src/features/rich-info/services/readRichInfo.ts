// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rich-info/services/readRichInfo`
 * Purpose: Read a user's rich info, either through the team gate or directly for provisioning.
 * Scope: Team lookups, gate decision and repository read. Does not parse HTTP or resolve sessions.
 * Invariants:
 *   - Gate is evaluated per call from fresh team lookups; no caching
 *   - A user never written reads as an empty field list
 *   - Every denial throws RichInfoAccessDeniedError, whatever the reason
 * Side-effects: IO (via RichInfoRepository and TeamMembershipReader ports)
 * Links: core/rich-info/access.ts
 * @public
 */

import type { UserId } from "@roster/ids";

import {
  decideReadAccess,
  emptyRichInfo,
  ensureAllowed,
  type RichInfo,
} from "@/core";
import type { RichInfoRepository, TeamMembershipReader } from "@/ports";

export interface RichInfoReadDeps {
  richInfoRepository: RichInfoRepository;
  teamMembership: TeamMembershipReader;
}

export interface MemberReadInput {
  callerId: UserId;
  targetId: UserId;
}

/**
 * Store read without authorization. Never reports "not found".
 */
export async function readRichInfo(
  richInfoRepository: RichInfoRepository,
  targetId: UserId
): Promise<RichInfo> {
  const fields = await richInfoRepository.get(targetId);
  if (fields === null) return emptyRichInfo();
  return { fields };
}

export async function readRichInfoAsMember(
  deps: RichInfoReadDeps,
  input: MemberReadInput
): Promise<RichInfo> {
  const [callerTeam, targetTeam] = await Promise.all([
    deps.teamMembership.getUserTeam(input.callerId),
    deps.teamMembership.getUserTeam(input.targetId),
  ]);

  ensureAllowed(decideReadAccess({ callerTeam, targetTeam }));

  return readRichInfo(deps.richInfoRepository, input.targetId);
}
