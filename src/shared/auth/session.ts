// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/auth/session`
 * Purpose: Canonical session identity type shared across layers.
 * Scope: Identity of the authenticated caller; does not contain runtime behavior.
 * Invariants: id is a validated UserId; contains only serializable primitives.
 * Side-effects: none
 * Links: app/_lib/auth/session
 * @public
 */

import type { UserId } from "@roster/ids";

export interface SessionUser {
  id: UserId;
}
