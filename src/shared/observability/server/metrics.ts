// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Prometheus metrics registry and metric definitions.
 * Scope: Shared observability singleton. Provides registry and metric handles. Does not implement the scrape endpoint.
 * Invariants: Single registry per process via globalThis; labels always low-cardinality (never user or team ids).
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: getOrCreate pattern prevents duplicate registration errors when tests reload modules.
 * Links: app/api/metrics/route.ts, bootstrap/http/wrapRouteHandlerWithLogging.ts
 * @public
 */

import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
  metricsInitialized?: boolean;
};

export const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new client.Registry();

if (!globalForMetrics.metricsInitialized) {
  globalForMetrics.metricsRegistry = metricsRegistry;
  globalForMetrics.metricsInitialized = true;

  metricsRegistry.setDefaultLabels({
    app: "roster-profile",
    // biome-ignore lint/style/noProcessEnv: Module-level init runs before serverEnv() available
    env: process.env.DEPLOY_ENVIRONMENT ?? "local",
  });
  client.collectDefaultMetrics({ register: metricsRegistry });
}

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames,
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[],
  buckets: number[]
): Histogram<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram<T>;
  return new client.Histogram({
    name,
    help,
    labelNames,
    buckets,
    registers: [metricsRegistry],
  });
}

// HTTP

export const httpRequestsTotal = getOrCreateCounter(
  "http_requests_total",
  "Total number of HTTP requests",
  ["route", "method", "status"] as const
);

export const httpRequestDurationMs = getOrCreateHistogram(
  "http_request_duration_ms",
  "HTTP request duration in milliseconds",
  ["route", "method"] as const,
  [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000]
);

// Rich info

export type RichInfoUpdateOutcome =
  | "stored"
  | "duplicate_field"
  | "too_large"
  | "forbidden";

export const richInfoUpdatesTotal = getOrCreateCounter(
  "rich_info_updates_total",
  "Rich info update attempts by outcome",
  ["outcome", "source"] as const
);

export const richInfoReadsTotal = getOrCreateCounter(
  "rich_info_reads_total",
  "Rich info reads by gate outcome",
  ["outcome", "source"] as const
);

export function statusBucket(status: number): "2xx" | "4xx" | "5xx" {
  if (status >= 200 && status < 300) return "2xx";
  if (status >= 400 && status < 500) return "4xx";
  return "5xx";
}
