// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/errorResponse`
 * Purpose: Build JSON error responses in the shared `{ code, label, message }` shape.
 * Scope: Response construction only. Does not decide which error maps to which status.
 * Invariants: `code` always equals the HTTP status.
 * Side-effects: none
 * Links: contracts/error.rich-info.v1.contract.ts
 * @public
 */

import type {
  ErrorBody,
  ErrorLabel,
} from "@/contracts/error.rich-info.v1.contract";

export function errorResponse(
  status: number,
  label: ErrorLabel,
  message: string
): Response {
  const body: ErrorBody = { code: status, label, message };
  return Response.json(body, { status });
}
