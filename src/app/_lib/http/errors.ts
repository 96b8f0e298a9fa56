// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_lib/http/errors`
 * Purpose: Map rich info domain, feature and validation errors to HTTP responses.
 * Scope: Shared by the rich info routes. Returns null for errors it does not know so the wrapper treats them as unhandled.
 * Invariants:
 *   - Every access denial yields the same 403 body, whatever the reason
 *   - Expected rejections log at warn via logRequestWarn
 * Side-effects: IO (logging)
 * Links: contracts/error.rich-info.v1.contract.ts, bootstrap/http/errorResponse.ts
 * @public
 */

import { ZodError } from "zod";

import { errorResponse } from "@/bootstrap/http";
import {
  isDuplicateRichFieldError,
  isRichInfoAccessDeniedError,
  isRichInfoTooLargeError,
} from "@/core";
import { isRichInfoFeatureError } from "@/features/rich-info/public";
import { logRequestWarn, type RequestContext } from "@/shared/observability";

export const FORBIDDEN_MESSAGE = "Insufficient permissions";

export function forbiddenResponse(): Response {
  return errorResponse(403, "insufficient-permissions", FORBIDDEN_MESSAGE);
}

export function unauthorizedResponse(): Response {
  return errorResponse(401, "invalid-credentials", "Authentication required");
}

export function badRequestResponse(message: string): Response {
  return errorResponse(400, "bad-request", message);
}

export function handleRichInfoRouteError(
  ctx: RequestContext,
  error: unknown
): Response | null {
  if (error instanceof ZodError) {
    logRequestWarn(ctx.log, error, "VALIDATION_ERROR");
    return badRequestResponse("Invalid request body");
  }

  if (isDuplicateRichFieldError(error)) {
    logRequestWarn(ctx.log, error, error.code);
    return errorResponse(
      400,
      "duplicate-rich-field",
      "Duplicate field names in rich info"
    );
  }

  if (isRichInfoTooLargeError(error)) {
    logRequestWarn(ctx.log, error, error.code);
    return errorResponse(413, "too-large-rich-info", "Rich info too large");
  }

  if (isRichInfoAccessDeniedError(error)) {
    logRequestWarn(ctx.log, error, error.code);
    return forbiddenResponse();
  }

  if (isRichInfoFeatureError(error) && error.kind === "OWNER_NOT_FOUND") {
    logRequestWarn(ctx.log, `unknown user ${error.userId}`, "OWNER_NOT_FOUND");
    return errorResponse(404, "not-found", "User not found");
  }

  return null;
}

/**
 * Body parse failures are a client error, not an unhandled one.
 */
export async function readJsonBody(
  request: Request
): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await request.json() };
  } catch {
    return { ok: false };
  }
}
