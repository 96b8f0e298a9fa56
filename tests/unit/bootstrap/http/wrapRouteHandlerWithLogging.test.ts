// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/bootstrap/http/wrapRouteHandlerWithLogging`
 * Purpose: Verifies the route wrapper's auth gate, error policy and logging envelope.
 * Scope: Wrapper behavior with a mocked container. Does NOT test real routes.
 * Invariants: Exactly one start and one end log per request; 401 before the handler runs; unhandled errors follow unhandledErrorPolicy.
 * Side-effects: global (prom-client counters)
 * Links: src/bootstrap/http/wrapRouteHandlerWithLogging.ts
 * @public
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { makeRequest, TEST_SESSION_USER_1 } from "@tests/_fakes";

const state = vi.hoisted(() => ({
  policy: "rethrow" as "rethrow" | "respond_500",
  childLog: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock("@/bootstrap/container", () => ({
  getContainer: vi.fn(() => ({
    log: { child: vi.fn(() => state.childLog) },
    clock: { now: () => "2025-01-01T00:00:00.000Z" },
    config: { unhandledErrorPolicy: state.policy },
  })),
}));

describe("wrapRouteHandlerWithLogging", () => {
  beforeEach(() => {
    state.policy = "rethrow";
    state.childLog.info.mockClear();
    state.childLog.warn.mockClear();
    state.childLog.error.mockClear();
  });

  it("passes the session user and context through to the handler", async () => {
    const handler = vi.fn(async () => Response.json({ ok: true }));
    const route = wrapRouteHandlerWithLogging(
      {
        routeId: "test.required",
        auth: {
          mode: "required",
          getSessionUser: async () => TEST_SESSION_USER_1,
        },
      },
      handler
    );
    const context = { params: Promise.resolve({ userId: "u" }) };

    const response = await route(makeRequest("/x"), context);

    expect(response.status).toBe(200);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(
      expect.objectContaining({ routeId: "test.required" }),
      expect.any(Request),
      TEST_SESSION_USER_1,
      context
    );
  });

  it("answers 401 without calling the handler when a session is required", async () => {
    const handler = vi.fn(async () => Response.json({}));
    const route = wrapRouteHandlerWithLogging(
      {
        routeId: "test.required",
        auth: { mode: "required", getSessionUser: async () => null },
      },
      handler
    );

    const response = await route(makeRequest("/x"));

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      code: 401,
      label: "invalid-credentials",
      message: "Authentication required",
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it("logs one start line and one end line with the final status", async () => {
    const route = wrapRouteHandlerWithLogging(
      { routeId: "test.none" },
      async () => new Response(null, { status: 204 })
    );

    await route(makeRequest("/x"));

    expect(state.childLog.info).toHaveBeenCalledWith("request received");
    const endCalls = state.childLog.info.mock.calls.filter(
      (call) => call[1] === "request complete"
    );
    expect(endCalls).toHaveLength(1);
    expect(endCalls[0]?.[0]).toMatchObject({ status: 204 });
  });

  it("rethrows unhandled errors under the rethrow policy", async () => {
    const boom = new Error("boom");
    const route = wrapRouteHandlerWithLogging({ routeId: "test.none" }, async () => {
      throw boom;
    });

    await expect(route(makeRequest("/x"))).rejects.toBe(boom);
    expect(state.childLog.error).toHaveBeenCalledWith(
      { err: boom, errorCode: "INTERNAL_SERVER_ERROR" },
      "request failed"
    );
  });

  it("converts unhandled errors to 500 under respond_500", async () => {
    state.policy = "respond_500";
    const route = wrapRouteHandlerWithLogging({ routeId: "test.none" }, async () => {
      throw new Error("boom");
    });

    const response = await route(makeRequest("/x"));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      code: 500,
      label: "server-error",
      message: "Internal server error",
    });
  });
});
