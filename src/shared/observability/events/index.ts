// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging.
 * Scope: Valid event names as a const registry plus base fields. Payload shapes live beside each domain.
 * Invariants: All event names registered here; logEvent() enforces reqId.
 * Side-effects: none
 * @public
 */

export const EVENT_NAMES = {
  // Rich info
  RICH_INFO_READ: "rich_info.read",
  RICH_INFO_UPDATED: "rich_info.updated",
  RICH_INFO_UPDATE_REJECTED: "rich_info.update_rejected",
  RICH_INFO_ACCESS_DENIED: "rich_info.access_denied",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Required base fields for all events.
 */
export interface EventBase {
  reqId: string;
  routeId?: string;
}
