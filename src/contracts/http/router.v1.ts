// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/http/router.v1`
 * Purpose: ts-rest router describing the public HTTP surface.
 * Scope: Method, path and response schemas per public route. Internal and metrics routes are left out.
 * Invariants: Paths and schemas match app/routes.ts.
 * Side-effects: none
 * Links: openapi.v1.ts
 * @internal
 */

import { initContract } from "@ts-rest/core";

import { ErrorBodySchema } from "@/contracts/error.rich-info.v1.contract";
import { metaLivezOutputSchema } from "@/contracts/meta.livez.read.v1.contract";
import {
  metaReadyzFailureSchema,
  metaReadyzOutputSchema,
} from "@/contracts/meta.readyz.read.v1.contract";
import {
  RichInfoWireSchema,
  UserIdParamsSchema,
} from "@/contracts/users.rich-info.read.v1.contract";
import {
  RichInfoUpdateInputSchema,
  RichInfoUpdateOutputSchema,
} from "@/contracts/users.rich-info.update.v1.contract";

const c = initContract();

export const ApiContractV1 = c.router({
  usersRichInfoRead: {
    method: "GET",
    path: "/api/v1/users/:userId/rich-info",
    pathParams: UserIdParamsSchema,
    summary: "Read a user's rich info",
    responses: {
      200: RichInfoWireSchema,
      400: ErrorBodySchema,
      401: ErrorBodySchema,
      403: ErrorBodySchema,
    },
  },
  selfRichInfoUpdate: {
    method: "PUT",
    path: "/api/v1/self/rich-info",
    summary: "Replace own rich info",
    body: RichInfoUpdateInputSchema,
    responses: {
      200: RichInfoUpdateOutputSchema,
      400: ErrorBodySchema,
      401: ErrorBodySchema,
      403: ErrorBodySchema,
      413: ErrorBodySchema,
    },
  },
  metaLivez: {
    method: "GET",
    path: "/livez",
    summary: "Liveness probe",
    responses: {
      200: metaLivezOutputSchema,
    },
  },
  metaReadyz: {
    method: "GET",
    path: "/readyz",
    summary: "Readiness probe",
    responses: {
      200: metaReadyzOutputSchema,
      503: metaReadyzFailureSchema,
    },
  },
});
