// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events/rich-info`
 * Purpose: Payload shapes for rich info domain events.
 * Scope: Type definitions only.
 * Invariants: Never carries field values; names appear only for the offending duplicate.
 * Notes: Type aliases, not interfaces, so payloads stay assignable to logEvent's Record<string, unknown>.
 * Side-effects: none
 * @public
 */

/** member: through the team gate; internal: provisioning bearer routes */
export type RichInfoSource = "member" | "internal";

export type RichInfoReadEvent = {
  reqId: string;
  routeId: string;
  callerId?: string | undefined;
  targetUserId: string;
  source: RichInfoSource;
  fieldCount: number;
  durationMs: number;
};

export type RichInfoUpdatedEvent = {
  reqId: string;
  routeId: string;
  targetUserId: string;
  source: RichInfoSource;
  fieldCount: number;
  droppedEmptyCount: number;
  size: number;
  durationMs: number;
};

export type RichInfoUpdateRejectedEvent = {
  reqId: string;
  routeId: string;
  targetUserId: string;
  source: RichInfoSource;
  errorCode: string;
  size?: number | undefined;
  limit?: number | undefined;
  duplicateName?: string | undefined;
};

export type RichInfoAccessDeniedEvent = {
  reqId: string;
  routeId: string;
  callerId: string;
  targetUserId: string;
  operation: "read" | "write";
  reason: string;
};
