// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@roster/ids`
 * Purpose: Branded ID types for users and teams shared across the service and its packages.
 * Scope: Type definitions and boundary constructors only. Does not look anything up.
 * Invariants:
 * - toUserId() / toTeamId() are the only entry points for creating a UserId / TeamId (validated UUID)
 * - Only edge code (HTTP handlers, adapters reading rows, test fixtures) should call them
 * - No `as UserId` / `as TeamId` casts outside this module
 * Side-effects: none
 * @public
 */

import type { Tagged } from "type-fest";

/** UUID format regex (versions 1-8), single source of truth for ID validation. */
export const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/** Branded user identity. */
export type UserId = Tagged<string, "UserId">;

/** Branded team identity. */
export type TeamId = Tagged<string, "TeamId">;

export class InvalidIdError extends Error {
  constructor(
    public readonly kind: "UserId" | "TeamId",
    public readonly raw: string
  ) {
    super(`Invalid ${kind} (expected UUID): ${raw}`);
    this.name = "InvalidIdError";
  }
}

export function isUuid(raw: string): boolean {
  return UUID_RE.test(raw);
}

/** Validate and brand a raw string as UserId. Boundary constructor, call at edges only. */
export function toUserId(raw: string): UserId {
  if (!isUuid(raw)) {
    throw new InvalidIdError("UserId", raw);
  }
  return raw.toLowerCase() as UserId;
}

/** Validate and brand a raw string as TeamId. */
export function toTeamId(raw: string): TeamId {
  if (!isUuid(raw)) {
    throw new InvalidIdError("TeamId", raw);
  }
  return raw.toLowerCase() as TeamId;
}

/** Non-throwing variant for request parsing; returns null on malformed input. */
export function parseUserId(raw: string | null | undefined): UserId | null {
  if (!raw || !isUuid(raw)) return null;
  return toUserId(raw);
}

/** Non-throwing TeamId variant for values read from rows owned by another service. */
export function parseTeamId(raw: string | null | undefined): TeamId | null {
  if (!raw || !isUuid(raw)) return null;
  return toTeamId(raw);
}
