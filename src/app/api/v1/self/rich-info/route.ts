// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/self/rich-info`
 * Purpose: Replace the caller's own rich info.
 * Scope: Session check, body parsing against the contract, facade call, error mapping.
 * Invariants: 400 bad-request on malformed JSON or shape; 400 duplicate-rich-field; 413 too-large-rich-info; 403 when the caller has no team.
 * Side-effects: IO (HTTP response, via facade)
 * Links: `@contracts/users.rich-info.update.v1.contract`, app/_facades/rich-info
 * @public
 */

import { updateOwnRichInfoFacade } from "@/app/_facades/rich-info/rich-info.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import {
  badRequestResponse,
  handleRichInfoRouteError,
  readJsonBody,
  unauthorizedResponse,
} from "@/app/_lib/http/errors";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { usersRichInfoUpdateOperation } from "@/contracts/users.rich-info.update.v1.contract";

export const PUT = wrapRouteHandlerWithLogging(
  {
    routeId: "users.rich_info.update_self",
    auth: { mode: "required", getSessionUser },
  },
  async (ctx, request, sessionUser) => {
    if (!sessionUser) return unauthorizedResponse();

    const parsedBody = await readJsonBody(request);
    if (!parsedBody.ok) return badRequestResponse("Invalid JSON body");

    try {
      const body = usersRichInfoUpdateOperation.input.parse(parsedBody.body);
      const result = await updateOwnRichInfoFacade({ sessionUser, body }, ctx);
      return Response.json(usersRichInfoUpdateOperation.output.parse(result));
    } catch (error) {
      const handled = handleRichInfoRouteError(ctx, error);
      if (handled) return handled;
      throw error;
    }
  }
);
