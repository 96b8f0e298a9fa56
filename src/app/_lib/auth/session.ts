// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_lib/auth/session`
 * Purpose: Resolve the caller from the identity header set by the upstream gateway.
 * Scope: Header parsing only. Does not check that the user exists.
 * Invariants: Returns null unless `z-user` holds exactly one UUID; ids are lowercased.
 * Side-effects: none
 * Notes: The gateway authenticates users and strips any client-supplied `z-user` before forwarding.
 * @public
 */

import { parseUserId } from "@roster/ids";

import type { SessionUser } from "@/shared/auth";

export const SESSION_USER_HEADER = "z-user";

export async function getSessionUser(
  request: Request
): Promise<SessionUser | null> {
  const id = parseUserId(request.headers.get(SESSION_USER_HEADER)?.trim());
  if (!id) return null;
  return { id };
}
