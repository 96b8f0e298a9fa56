// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rich-info/services/updateRichInfo`
 * Purpose: Validate, normalize and store a full replacement of a user's rich info.
 * Scope: Self-write gate, core rules and repository write. Does not map wire DTOs.
 * Invariants:
 *   - Duplicate check, then empty-drop, then size check; the repository is only called when all pass
 *   - A rejected update leaves stored state unchanged
 *   - Self-writes target the caller and require a team membership
 * Side-effects: IO (via RichInfoRepository and TeamMembershipReader ports)
 * Notes: Port errors are rethrown as RichInfoFeatureError.
 * Links: core/rich-info/rules.ts, features/rich-info/errors.ts
 * @public
 */

import type { UserId } from "@roster/ids";

import {
  decideSelfWriteAccess,
  ensureAllowed,
  prepareRichInfoUpdate,
  type RichField,
  richInfoSize,
} from "@/core";
import type { RichInfoRepository, TeamMembershipReader } from "@/ports";

import { mapRichInfoPortErrorToFeature } from "../errors";

export interface RichInfoWriteDeps {
  richInfoRepository: RichInfoRepository;
  limit: number;
}

export interface SelfWriteDeps extends RichInfoWriteDeps {
  teamMembership: TeamMembershipReader;
}

export interface RichInfoWriteResult {
  fields: RichField[];
  droppedEmptyCount: number;
  size: number;
}

export async function replaceRichInfo(
  deps: RichInfoWriteDeps,
  targetId: UserId,
  fields: readonly RichField[]
): Promise<RichInfoWriteResult> {
  const normalized = prepareRichInfoUpdate(fields, deps.limit);

  try {
    await deps.richInfoRepository.replace(targetId, normalized);
  } catch (error) {
    const mapped = mapRichInfoPortErrorToFeature(error);
    if (mapped.kind === "OWNER_NOT_FOUND") throw mapped;
    throw error;
  }

  return {
    fields: normalized,
    droppedEmptyCount: fields.length - normalized.length,
    size: richInfoSize(normalized),
  };
}

export async function updateOwnRichInfo(
  deps: SelfWriteDeps,
  input: { callerId: UserId; fields: readonly RichField[] }
): Promise<RichInfoWriteResult> {
  const callerTeam = await deps.teamMembership.getUserTeam(input.callerId);
  ensureAllowed(decideSelfWriteAccess({ callerTeam }));

  return replaceRichInfo(deps, input.callerId, input.fields);
}
