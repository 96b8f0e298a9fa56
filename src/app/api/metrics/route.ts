// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/metrics`
 * Purpose: Prometheus scrape endpoint.
 * Scope: Exposes the metrics registry behind bearer auth. Does not define or record metrics.
 * Invariants: METRICS_TOKEN required (500 while unset); constant-time compare.
 * Side-effects: IO (reads metrics registry, records HTTP metrics)
 * Links: shared/observability/server/metrics.ts, bootstrap/http/bearer.ts
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import {
  errorResponse,
  hasValidBearer,
  wrapRouteHandlerWithLogging,
} from "@/bootstrap/http";
import { metricsRegistry } from "@/shared/observability";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "meta.metrics", auth: { mode: "none" } },
  async (ctx, request) => {
    const configuredToken = getContainer().config.metricsToken;

    if (!configuredToken) {
      ctx.log.error("METRICS_TOKEN not configured");
      return errorResponse(500, "server-error", "METRICS_TOKEN not configured");
    }

    if (!hasValidBearer(request, configuredToken)) {
      return errorResponse(401, "invalid-credentials", "Unauthorized");
    }

    const metrics = await metricsRegistry.metrics();
    return new Response(metrics, {
      headers: {
        "Content-Type": metricsRegistry.contentType,
        "Cache-Control": "no-store",
      },
    });
  }
);
