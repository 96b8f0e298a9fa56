// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/contract/app/users.rich-info.read`
 * Purpose: Contract tests for GET /api/v1/users/:userId/rich-info.
 * Scope: Route handler over the test-mode container with seeded team membership. Does NOT go through express.
 * Invariants: 200 bodies match the read contract; every denial is 403 with one fixed body.
 * Side-effects: none (in-memory adapters)
 * Links: src/app/api/v1/users/[userId]/rich-info/route.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { getTestRichInfoRepository, getTestTeamMembership } from "@/adapters/test";
import { GET } from "@/app/api/v1/users/[userId]/rich-info/route";
import { usersRichInfoReadOperation } from "@/contracts/users.rich-info.read.v1.contract";
import {
  makeRequest,
  routeParams,
  TEST_TEAM_ID_1,
  TEST_TEAM_ID_2,
  TEST_USER_ID_1,
  TEST_USER_ID_2,
  TEST_USER_ID_3,
} from "@tests/_fakes";

const FORBIDDEN_BODY = {
  code: 403,
  label: "insufficient-permissions",
  message: "Insufficient permissions",
};

function readAs(caller: string | undefined, target: string): Promise<Response> {
  return GET(
    makeRequest(`/api/v1/users/${target}/rich-info`, {
      ...(caller ? { caller } : {}),
    }),
    routeParams({ userId: target })
  );
}

describe("GET /api/v1/users/:userId/rich-info", () => {
  it("returns an empty versioned list for a teammate never written", async () => {
    const teams = getTestTeamMembership();
    teams.addMember(TEST_TEAM_ID_1, TEST_USER_ID_1);
    teams.addMember(TEST_TEAM_ID_1, TEST_USER_ID_2);

    const response = await readAs(TEST_USER_ID_1, TEST_USER_ID_2);

    expect(response.status).toBe(200);
    const body = usersRichInfoReadOperation.output.parse(await response.json());
    expect(body).toEqual({ fields: [], version: 0 });
  });

  it("returns stored fields in order using wire names", async () => {
    const teams = getTestTeamMembership();
    teams.addMember(TEST_TEAM_ID_1, TEST_USER_ID_1);
    teams.addMember(TEST_TEAM_ID_1, TEST_USER_ID_2);
    await getTestRichInfoRepository().replace(TEST_USER_ID_2, [
      { name: "title", value: "Lead" },
      { name: "department", value: "blue" },
    ]);

    const response = await readAs(TEST_USER_ID_1, TEST_USER_ID_2);

    expect(await response.json()).toEqual({
      fields: [
        { type: "title", value: "Lead" },
        { type: "department", value: "blue" },
      ],
      version: 0,
    });
  });

  it("answers 401 without a session header", async () => {
    const response = await readAs(undefined, TEST_USER_ID_2);

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      code: 401,
      label: "invalid-credentials",
      message: "Authentication required",
    });
  });

  it("answers 401 for a malformed session header", async () => {
    const response = await readAs("not-a-uuid", TEST_USER_ID_2);
    expect(response.status).toBe(401);
  });

  it("answers 400 for a malformed target id", async () => {
    getTestTeamMembership().addMember(TEST_TEAM_ID_1, TEST_USER_ID_1);

    const response = await readAs(TEST_USER_ID_1, "not-a-uuid");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      code: 400,
      label: "bad-request",
      message: "Invalid user id",
    });
  });

  it("answers the same 403 for every kind of denial", async () => {
    const teams = getTestTeamMembership();
    teams.addMember(TEST_TEAM_ID_1, TEST_USER_ID_1);
    teams.addMember(TEST_TEAM_ID_2, TEST_USER_ID_2);

    const responses = await Promise.all([
      // caller in another team
      readAs(TEST_USER_ID_2, TEST_USER_ID_1),
      // caller in no team
      readAs(TEST_USER_ID_3, TEST_USER_ID_1),
      // target in no team
      readAs(TEST_USER_ID_1, TEST_USER_ID_3),
      // target in no team reading itself
      readAs(TEST_USER_ID_3, TEST_USER_ID_3),
    ]);

    for (const response of responses) {
      expect(response.status).toBe(403);
      expect(await response.json()).toEqual(FORBIDDEN_BODY);
    }
  });
});
