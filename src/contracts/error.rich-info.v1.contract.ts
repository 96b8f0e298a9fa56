// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/error.rich-info.v1.contract`
 * Purpose: Error body shared by every rich info endpoint.
 * Scope: Zod schema and label registry for error responses. Does not map errors to statuses.
 * Invariants: `code` equals the HTTP status; `label` is stable and machine-readable; every 403 uses the same label and message.
 * Side-effects: none
 * Links: app/_lib/http/errors.ts
 * @public
 */

import { z } from "zod";

export const ErrorLabelSchema = z.enum([
  "bad-request",
  "duplicate-rich-field",
  "insufficient-permissions",
  "invalid-credentials",
  "not-found",
  "too-large-rich-info",
  "server-error",
]);

export type ErrorLabel = z.infer<typeof ErrorLabelSchema>;

export const ErrorBodySchema = z.object({
  code: z.number().int(),
  label: ErrorLabelSchema,
  message: z.string(),
});

export type ErrorBody = z.infer<typeof ErrorBodySchema>;
