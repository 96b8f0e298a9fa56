// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/ports/harness/team-membership.port`
 * Purpose: Shared contract tests for TeamMembershipReader.
 * Scope: Lookup semantics only. Seeding is delegated to the adapter spec, since the port itself is read-only.
 * Invariants: Unknown users resolve to null without throwing.
 * Side-effects: IO when the adapter under test is database-backed
 * Links: TeamMembershipReader port, tests/ports/team-membership.port.spec.ts
 * @internal
 */

import type { TeamId, UserId } from "@roster/ids";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import type { TeamMembershipReader } from "@/ports";
import { newTestTeamId, newTestUserId } from "@tests/_fakes";

import { dispose, makeHarness, type TestHarness } from "./factory";

export interface TeamMembershipFixture {
  reader: TeamMembershipReader;
  seedMember(teamId: TeamId, userId: UserId): Promise<void>;
}

export function registerTeamMembershipReaderContract(
  makeFixture: (h: TestHarness) => Promise<TeamMembershipFixture>
): void {
  describe("TeamMembershipReader Port Contract", () => {
    let h: TestHarness;
    let fixture: TeamMembershipFixture;

    beforeAll(async () => {
      h = await makeHarness();
      fixture = await makeFixture(h);
    });

    afterAll(async () => {
      await dispose(h);
    });

    it("returns null for a user with no team", async () => {
      expect(await fixture.reader.getUserTeam(newTestUserId())).toBeNull();
    });

    it("returns the team of a member", async () => {
      const teamId = newTestTeamId();
      const userId = newTestUserId();
      await fixture.seedMember(teamId, userId);

      expect(await fixture.reader.getUserTeam(userId)).toBe(teamId);
    });

    it("resolves members of different teams independently", async () => {
      const teamA = newTestTeamId();
      const teamB = newTestTeamId();
      const alice = newTestUserId();
      const bob = newTestUserId();
      await fixture.seedMember(teamA, alice);
      await fixture.seedMember(teamB, bob);

      expect(await fixture.reader.getUserTeam(alice)).toBe(teamA);
      expect(await fixture.reader.getUserTeam(bob)).toBe(teamB);
    });
  });
}
