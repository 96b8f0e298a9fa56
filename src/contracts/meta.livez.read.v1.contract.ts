// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/meta.livez.read.v1.contract`
 * Purpose: Contract for the liveness probe.
 * Scope: Process is up and serving HTTP. Does not check env, database or team lookups.
 * Invariants: HTTP status is primary truth: 200 = alive, 5xx = not alive.
 * Side-effects: none
 * Links: /livez endpoint
 * @internal
 */

import { z } from "zod";

export const metaLivezOutputSchema = z.object({
  status: z.enum(["alive"]),
  timestamp: z.string(),
});

export const metaLivezOperation = {
  id: "meta.livez.read.v1",
  summary: "Liveness probe",
  description: "Confirms the process is alive. No dependency checks.",
  input: null,
  output: metaLivezOutputSchema,
} as const;
