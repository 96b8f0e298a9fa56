// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/meta.readyz.read.v1.contract`
 * Purpose: Contract for the readiness probe.
 * Scope: Environment validation and adapter wiring. Does not probe database latency.
 * Invariants: 200 = ready, 503 = not ready; the 503 body uses the failure schema.
 * Side-effects: none
 * Links: /readyz endpoint
 * @internal
 */

import { z } from "zod";

export const metaReadyzOutputSchema = z.object({
  status: z.enum(["healthy"]),
  timestamp: z.string(),
  version: z.string().optional(),
});

export const metaReadyzFailureSchema = z.object({
  status: z.literal("error"),
  reason: z.string(),
  missing: z.array(z.string()).optional(),
  invalid: z.array(z.string()).optional(),
});

export const metaReadyzOperation = {
  id: "meta.readyz.read.v1",
  summary: "Readiness probe",
  description:
    "Validates environment configuration and resolves adapters. HTTP status: 200 = ready, 503 = not ready.",
  input: null,
  output: metaReadyzOutputSchema,
} as const;
