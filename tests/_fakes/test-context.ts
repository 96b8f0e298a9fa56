// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/test-context`
 * Purpose: RequestContext factory for tests calling facades and helpers.
 * Scope: Noop logger and FakeClock. Does not replace the real logger in production code.
 * Side-effects: none
 * @public
 */

import type { SessionUser } from "@/shared/auth";
import { makeNoopLogger, type RequestContext } from "@/shared/observability";

import { FakeClock } from "./fake-clock";

export interface TestCtxOptions {
  reqId?: string;
  routeId?: string;
  session?: SessionUser;
}

export function makeTestCtx(options: TestCtxOptions = {}): RequestContext {
  return {
    log: makeNoopLogger(),
    reqId: options.reqId ?? "test-req-1",
    routeId: options.routeId ?? "test.route",
    session: options.session,
    clock: new FakeClock(),
  };
}
