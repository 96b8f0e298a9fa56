// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters, canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export { closeDb, type Database, getDb } from "./db/client";
export { DrizzleRichInfoRepository } from "./rich-info/drizzle.adapter";
export { DrizzleTeamMembershipReader } from "./teams/drizzle-membership.adapter";
export { SystemClock } from "./time/system.adapter";
