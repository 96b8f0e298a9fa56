// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/wrapRouteHandlerWithLogging`
 * Purpose: Route wrapper providing the request logging envelope and HTTP metrics.
 * Scope: ctx creation, session check, timing, envelope logging, Prometheus metrics. Does not implement route-specific logic.
 * Invariants: Always logs request start/end exactly once; always records metrics (even on 5xx); catches unhandled errors.
 * Side-effects: IO (creates request context, emits structured log entries, records Prometheus metrics)
 * Notes: Domain events go in facades, not here.
 *        Unhandled errors are logged, then rethrown in dev/test or converted to 500 in production.
 * Links: shared/observability helpers and metrics; bootstrap/http/express.ts mounts wrapped handlers.
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import type { SessionUser } from "@/shared/auth";
import {
  createRequestContext,
  httpRequestDurationMs,
  httpRequestsTotal,
  logRequestEnd,
  logRequestError,
  logRequestStart,
  type RequestContext,
  statusBucket,
} from "@/shared/observability";

import { errorResponse } from "./errorResponse";

/**
 * Path params as captured by the router.
 */
export interface RouteContext {
  params: Promise<Record<string, string>>;
}

export type WrappedRouteHandler = (
  request: Request,
  context?: RouteContext
) => Promise<Response>;

type RouteHandler = (
  ctx: RequestContext,
  request: Request,
  sessionUser: SessionUser | null,
  context?: RouteContext
) => Promise<Response>;

type GetSessionUser = (request: Request) => Promise<SessionUser | null>;

type WrapOptions =
  | {
      routeId: string;
      auth: { mode: "required"; getSessionUser: GetSessionUser };
    }
  | {
      routeId: string;
      auth: { mode: "optional"; getSessionUser: GetSessionUser };
    }
  | {
      routeId: string;
      auth?: { mode: "none" };
    };

/**
 * @example
 * export const GET = wrapRouteHandlerWithLogging(
 *   { routeId: "users.rich_info.read", auth: { mode: "required", getSessionUser } },
 *   async (ctx, request, sessionUser, context) => {
 *     const targetUserId = await readUserIdParam(context);
 *     return Response.json(await readMemberRichInfo({ sessionUser, targetUserId }, ctx));
 *   }
 * );
 */
export function wrapRouteHandlerWithLogging(
  options: WrapOptions,
  handler: RouteHandler
): WrappedRouteHandler {
  return async (
    request: Request,
    context?: RouteContext
  ): Promise<Response> => {
    const container = getContainer();

    const sessionUser =
      options.auth && options.auth.mode !== "none"
        ? await options.auth.getSessionUser(request)
        : null;

    const ctx = createRequestContext(
      { baseLog: container.log, clock: container.clock },
      request,
      {
        routeId: options.routeId,
        session: sessionUser ?? undefined,
      }
    );

    // Read before try so config failures never mask handler errors
    const { unhandledErrorPolicy } = container.config;

    logRequestStart(ctx.log);
    const start = performance.now();

    let responseStatus = 500;

    try {
      if (options.auth?.mode === "required" && !sessionUser) {
        responseStatus = 401;
        return errorResponse(
          responseStatus,
          "invalid-credentials",
          "Authentication required"
        );
      }

      const response = await handler(ctx, request, sessionUser, context);
      responseStatus = response.status;
      return response;
    } catch (error) {
      responseStatus = 500;
      logRequestError(ctx.log, error, "INTERNAL_SERVER_ERROR");

      if (unhandledErrorPolicy === "rethrow") {
        throw error;
      }

      return errorResponse(
        responseStatus,
        "server-error",
        "Internal server error"
      );
    } finally {
      const durationMs = performance.now() - start;

      logRequestEnd(ctx.log, { status: responseStatus, durationMs });

      httpRequestsTotal.inc({
        route: options.routeId,
        method: request.method,
        status: statusBucket(responseStatus),
      });
      httpRequestDurationMs.observe(
        { route: options.routeId, method: request.method },
        durationMs
      );
    }
  };
}
