// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/types`
 * Purpose: Request-scoped context carried from route wrapper through facades.
 * Scope: RequestContext and minimal Clock shape. Does not create contexts.
 * Invariants: log is a child logger with reqId, route, method bound.
 * Side-effects: none
 * Links: context/factory.ts, bootstrap/http/wrapRouteHandlerWithLogging.ts
 * @public
 */

import type { Logger } from "pino";

import type { SessionUser } from "@/shared/auth";

/**
 * Structural twin of ports/Clock so shared never imports ports.
 */
export interface Clock {
  now(): string;
}

export interface RequestContext {
  log: Logger;
  reqId: string;
  routeId: string;
  session?: SessionUser | undefined;
  clock: Clock;
}
