// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rich-info/errors`
 * Purpose: Translate rich info port errors into feature-level error shapes.
 * Scope: RichInfoFeatureError union, guard and mapper. Does not call ports.
 * Invariants: Pure functions, no I/O.
 * Side-effects: none
 * Links: src/features/rich-info/public.ts
 * @public
 */

import { isRichInfoOwnerNotFoundPortError } from "@/ports";

export type RichInfoFeatureError =
  | { kind: "OWNER_NOT_FOUND"; userId: string }
  | { kind: "GENERIC"; message?: string };

export function isRichInfoFeatureError(
  error: unknown
): error is RichInfoFeatureError {
  return (
    typeof error === "object" &&
    error !== null &&
    "kind" in error &&
    (error.kind === "OWNER_NOT_FOUND" || error.kind === "GENERIC")
  );
}

export function mapRichInfoPortErrorToFeature(
  error: unknown
): RichInfoFeatureError {
  if (isRichInfoOwnerNotFoundPortError(error)) {
    return { kind: "OWNER_NOT_FOUND", userId: error.userId };
  }
  return {
    kind: "GENERIC",
    ...(error instanceof Error ? { message: error.message } : {}),
  };
}
