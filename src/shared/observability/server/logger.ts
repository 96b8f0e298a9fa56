// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/logger`
 * Purpose: Pino logger factory, JSON-only stdout emission.
 * Scope: Create configured pino loggers. Does not handle request-scoped logging.
 * Invariants: Always emits JSON to stdout; no worker transports. Safe to call at module scope (no env validation).
 * Side-effects: none
 * Notes: Reads NODE_ENV, PINO_LOG_LEVEL, SERVICE_NAME directly so that logging never triggers full env validation.
 *        Pretty output is an external pipe (pino-pretty), not a transport.
 * Links: REDACT_PATHS; used by container and route wrapper.
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const isVitest = process.env.VITEST === "true";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const nodeEnv = process.env.NODE_ENV ?? "development";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const level = process.env.PINO_LOG_LEVEL ?? "info";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const serviceName = process.env.SERVICE_NAME ?? "roster-profile";

  return pino(
    {
      level,
      enabled: !(isVitest || nodeEnv === "test"),
      // bindings first so reserved keys win
      base: { ...bindings, app: "roster-profile", service: serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    pino.destination({
      dest: 1,
      sync: nodeEnv !== "production",
      minLength: nodeEnv === "production" ? 4096 : 0,
    })
  );
}

/**
 * For tests: pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
