// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/factory`
 * Purpose: Build a RequestContext with a sanitized request id.
 * Scope: Child logger creation and x-request-id sanitizing. Does not manage context lifecycle.
 * Invariants: reqId is at most 64 chars of [a-zA-Z0-9_-]; anything else is replaced by a fresh UUID.
 * Side-effects: none
 * @public
 */

import { randomUUID } from "node:crypto";

import type { Logger } from "pino";

import type { SessionUser } from "@/shared/auth";
import type { Clock, RequestContext } from "./types";

const REQUEST_ID_HEADER = "x-request-id";
const MAX_REQ_ID_LENGTH = 64;
const REQ_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

export function sanitizeReqId(incoming: string | null): string {
  if (
    incoming &&
    incoming.length <= MAX_REQ_ID_LENGTH &&
    REQ_ID_PATTERN.test(incoming)
  ) {
    return incoming;
  }
  return randomUUID();
}

export function createRequestContext(
  deps: { baseLog: Logger; clock: Clock },
  request: Request,
  meta: { routeId: string; session?: SessionUser | undefined }
): RequestContext {
  const reqId = sanitizeReqId(request.headers.get(REQUEST_ID_HEADER));

  return {
    log: deps.baseLog.child({
      reqId,
      route: meta.routeId,
      method: request.method,
    }),
    reqId,
    routeId: meta.routeId,
    session: meta.session,
    clock: deps.clock,
  };
}
