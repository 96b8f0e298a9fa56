// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/contract/app/meta.routes`
 * Purpose: Contract tests for /livez, /readyz, /openapi.json and /api/metrics.
 * Scope: Route handlers directly. Env-dependent cases rebuild the container and restore it afterwards.
 * Invariants: livez never touches env; readyz answers 503 with missing keys on invalid env; metrics needs its bearer.
 * Side-effects: process.env (restored after each test)
 * Links: src/app/(infra)/*, src/app/api/metrics/route.ts
 * @internal
 */

import { afterEach, describe, expect, it } from "vitest";

import { GET as livez } from "@/app/(infra)/livez/route";
import { GET as openapi } from "@/app/(infra)/openapi.json/route";
import { GET as readyz } from "@/app/(infra)/readyz/route";
import { GET as metrics } from "@/app/api/metrics/route";
import { resetContainer } from "@/bootstrap/container";
import { metaLivezOperation } from "@/contracts/meta.livez.read.v1.contract";
import {
  metaReadyzFailureSchema,
  metaReadyzOperation,
} from "@/contracts/meta.readyz.read.v1.contract";
import { resetServerEnv } from "@/shared/env";
import { makeRequest } from "@tests/_fakes";
import {
  BASE_VALID_ENV,
  TEST_METRICS_TOKEN,
} from "@tests/_fixtures/env/base-env";

function rebuildFromEnv(): void {
  resetServerEnv();
  resetContainer();
}

describe("meta routes", () => {
  afterEach(() => {
    Object.assign(process.env, BASE_VALID_ENV);
    rebuildFromEnv();
  });

  it("GET /livez answers alive", async () => {
    const response = await livez();

    expect(response.status).toBe(200);
    const body = metaLivezOperation.output.parse(await response.json());
    expect(body.status).toBe("alive");
  });

  it("GET /readyz answers healthy with a valid env", async () => {
    const response = await readyz();

    expect(response.status).toBe(200);
    expect(metaReadyzOperation.output.parse(await response.json())).toMatchObject(
      { status: "healthy", version: "1" }
    );
  });

  it("GET /readyz answers 503 naming the missing key", async () => {
    delete process.env.APP_ENV;
    rebuildFromEnv();

    const response = await readyz();

    expect(response.status).toBe(503);
    expect(metaReadyzFailureSchema.parse(await response.json())).toEqual({
      status: "error",
      reason: "INVALID_ENV",
      missing: ["APP_ENV"],
      invalid: [],
    });
  });

  it("GET /openapi.json serves the document", async () => {
    const response = await openapi();
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ info: { title: "Roster Profile API" } });
  });

  describe("GET /api/metrics", () => {
    it("serves Prometheus text with the right bearer", async () => {
      const response = await metrics(
        makeRequest("/api/metrics", { bearer: TEST_METRICS_TOKEN })
      );

      expect(response.status).toBe(200);
      expect(response.headers.get("cache-control")).toBe("no-store");
      expect(await response.text()).toContain("# TYPE rich_info_updates_total counter");
    });

    it("answers 401 for a wrong bearer", async () => {
      const response = await metrics(
        makeRequest("/api/metrics", { bearer: "wrong-token" })
      );

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({
        code: 401,
        label: "invalid-credentials",
        message: "Unauthorized",
      });
    });

    it("answers 500 while METRICS_TOKEN is unset", async () => {
      delete process.env.METRICS_TOKEN;
      rebuildFromEnv();

      const response = await metrics(
        makeRequest("/api/metrics", { bearer: TEST_METRICS_TOKEN })
      );

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({
        code: 500,
        label: "server-error",
        message: "METRICS_TOKEN not configured",
      });
    });
  });
});
