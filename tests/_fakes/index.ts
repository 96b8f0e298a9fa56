// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes`
 * Purpose: Barrel for deterministic test fakes.
 * Side-effects: none
 * @public
 */

export { FakeClock } from "./fake-clock";
export { makeRequest, richInfoBody, routeParams } from "./http";
export {
  newTestTeamId,
  newTestUserId,
  TEST_SESSION_USER_1,
  TEST_SESSION_USER_2,
  TEST_TEAM_ID_1,
  TEST_TEAM_ID_2,
  TEST_USER_ID_1,
  TEST_USER_ID_2,
  TEST_USER_ID_3,
  TEST_USER_ID_4,
} from "./ids";
export { makeTestCtx, type TestCtxOptions } from "./test-context";
