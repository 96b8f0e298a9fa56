// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/helpers`
 * Purpose: Standardized request logging helpers.
 * Scope: Request start/end/error/warn lines. Does not handle domain events (see logEvent).
 * Invariants: Same keys everywhere (route, reqId, method, status, durationMs, errorCode).
 * Side-effects: IO (emits structured log entries via provided logger)
 * Links: bootstrap/http/wrapRouteHandlerWithLogging.ts, route error mappers
 * @public
 */

import type { Logger } from "pino";

export function logRequestStart(log: Logger): void {
  log.info("request received");
}

/**
 * Level follows status: 5xx error, 4xx warn, otherwise info.
 */
export function logRequestEnd(
  log: Logger,
  meta: {
    status: number;
    durationMs: number;
  }
): void {
  const level =
    meta.status >= 500 ? "error" : meta.status >= 400 ? "warn" : "info";
  log[level](
    { status: meta.status, durationMs: meta.durationMs },
    "request complete"
  );
}

export function logRequestError(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  log.error({ err: error, errorCode }, "request failed");
}

/**
 * Expected client-side failure (validation, gate denial). Logged at warn without stack noise.
 */
export function logRequestWarn(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  const message = error instanceof Error ? error.message : String(error);
  log.warn({ errorCode, reason: message }, "request rejected");
}
