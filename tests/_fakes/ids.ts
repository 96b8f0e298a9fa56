// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/ids`
 * Purpose: Deterministic user and team identities for tests.
 * Scope: Branded ids and SessionUser fixtures. Does not create database rows.
 * Invariants: Built with toUserId()/toTeamId(), the same path as production edges.
 * Side-effects: none
 * @public
 */

import { randomUUID } from "node:crypto";
import { type TeamId, toTeamId, toUserId, type UserId } from "@roster/ids";

import type { SessionUser } from "@/shared/auth";

export const TEST_USER_ID_1: UserId = toUserId(
  "00000000-0000-4000-a000-000000000001"
);
export const TEST_USER_ID_2: UserId = toUserId(
  "00000000-0000-4000-a000-000000000002"
);
export const TEST_USER_ID_3: UserId = toUserId(
  "00000000-0000-4000-a000-000000000003"
);
export const TEST_USER_ID_4: UserId = toUserId(
  "00000000-0000-4000-a000-000000000004"
);

export const TEST_TEAM_ID_1: TeamId = toTeamId(
  "00000000-0000-4000-b000-000000000001"
);
export const TEST_TEAM_ID_2: TeamId = toTeamId(
  "00000000-0000-4000-b000-000000000002"
);

export const TEST_SESSION_USER_1: SessionUser = { id: TEST_USER_ID_1 };
export const TEST_SESSION_USER_2: SessionUser = { id: TEST_USER_ID_2 };

/** Random UserId for tests that need a fresh identity. */
export function newTestUserId(): UserId {
  return toUserId(randomUUID());
}

export function newTestTeamId(): TeamId {
  return toTeamId(randomUUID());
}
