// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability: events, logging, metrics, context.
 * Scope: Unified entry point for observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports (structural typing only).
 * Side-effects: none
 * @public
 */

// Context
export type { Clock, RequestContext } from "./context";
export { createRequestContext, sanitizeReqId } from "./context";
// Event registry
export type { EventBase, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export type {
  RichInfoAccessDeniedEvent,
  RichInfoReadEvent,
  RichInfoSource,
  RichInfoUpdatedEvent,
  RichInfoUpdateRejectedEvent,
} from "./events/rich-info";
// Server-side logging and metrics
export type { Logger, RichInfoUpdateOutcome } from "./server";
export {
  httpRequestDurationMs,
  httpRequestsTotal,
  logEvent,
  logRequestEnd,
  logRequestError,
  logRequestStart,
  logRequestWarn,
  makeLogger,
  makeNoopLogger,
  metricsRegistry,
  richInfoReadsTotal,
  richInfoUpdatesTotal,
  statusBucket,
} from "./server";
