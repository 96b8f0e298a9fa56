// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_lib/http/params`
 * Purpose: Read and validate the `userId` path param.
 * Scope: Param parsing only.
 * Side-effects: none
 * @public
 */

import { parseUserId, type UserId } from "@roster/ids";

import type { RouteContext } from "@/bootstrap/http";

/**
 * Null when the param is missing or not a UUID.
 */
export async function readUserIdParam(
  context: RouteContext | undefined
): Promise<UserId | null> {
  if (!context) return null;
  const params = await context.params;
  return parseUserId(params.userId);
}
