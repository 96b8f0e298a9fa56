// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time source injected into adapters and request contexts.
 * Scope: Current time only. Does not do date arithmetic.
 * Invariants: now() returns an ISO 8601 string
 * Side-effects: none (interface only)
 * Links: SystemClock (adapters/server/time), FakeClock (tests/_fakes)
 * @public
 */

export interface Clock {
  now(): string;
}
