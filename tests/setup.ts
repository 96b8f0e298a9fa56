// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/setup`
 * Purpose: Global test environment setup.
 * Scope: Sets a valid APP_ENV=test environment and clears the in-memory adapters between tests. Does NOT mock services or ports.
 * Invariants: Env is in place before any test module calls serverEnv(); no test sees another test's stored rich info or memberships.
 * Side-effects: process.env, in-memory adapter singletons
 * Links: vitest.config.mts, tests/_fixtures/env/base-env.ts
 * @public
 */

import { afterEach } from "vitest";

import {
  resetTestRichInfoRepository,
  resetTestTeamMembership,
} from "@/adapters/test";

import { BASE_VALID_ENV } from "./_fixtures/env/base-env";

Object.assign(process.env, BASE_VALID_ENV);

afterEach(() => {
  resetTestRichInfoRepository();
  resetTestTeamMembership();
});
