// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/rich-info`
 * Purpose: Persistence port for per-user rich info field lists.
 * Scope: Defines the storage contract. Does not validate fields or authorize callers.
 * Invariants:
 * - replace() is a total, atomic overwrite of the user's list; concurrent writers resolve last-writer-wins
 * - get() returns null for a user that was never written, never throws "not found"
 * - Field order round-trips exactly
 * - Adapters store what they are given; validation happens before the port is called
 * Side-effects: none (interface definition only)
 * Links: Implemented by DrizzleRichInfoRepository, InMemoryRichInfoRepository; used by features/rich-info
 * @public
 */

import type { UserId } from "@roster/ids";

import type { RichField } from "@/core";

/**
 * Port-level error thrown by adapters when the owning user row does not exist
 */
export class RichInfoOwnerNotFoundPortError extends Error {
  constructor(public readonly userId: string) {
    super(`Cannot store rich info for unknown user: ${userId}`);
    this.name = "RichInfoOwnerNotFoundPortError";
  }
}

export function isRichInfoOwnerNotFoundPortError(
  error: unknown
): error is RichInfoOwnerNotFoundPortError {
  return (
    error instanceof Error && error.name === "RichInfoOwnerNotFoundPortError"
  );
}

export interface RichInfoRepository {
  /**
   * Current field list, or null when nothing was ever stored for the user.
   */
  get(userId: UserId): Promise<RichField[] | null>;

  /**
   * Replace the user's whole field list. An empty list is stored as such.
   */
  replace(userId: UserId, fields: readonly RichField[]): Promise<void>;
}
