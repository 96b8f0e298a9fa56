// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Paths handed to pino's redact option. Does not implement redaction.
 * Invariants: Rich info values are user-authored profile data and never logged; only counts and names of offending fields are.
 * Side-effects: none
 * @public
 */

export const REDACT_PATHS = [
  // Secrets
  "password",
  "token",
  "secret",
  "INTERNAL_API_TOKEN",
  "METRICS_TOKEN",
  "DATABASE_URL",
  // HTTP headers
  "req.headers.authorization",
  "req.headers.cookie",
  "headers.authorization",
  "headers.cookie",
  // Profile payloads
  "fields",
  "rich_info",
];
