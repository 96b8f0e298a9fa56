// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/routes`
 * Purpose: Route table mapping HTTP method and path to route modules.
 * Scope: Declarative list only; served by bootstrap/http/express.
 * Invariants: Every route.ts under src/app is listed exactly once; paths match contracts/http/router.v1.ts.
 * Side-effects: none
 * @public
 */

import { GET as livezGet } from "@/app/(infra)/livez/route";
import { GET as openapiGet } from "@/app/(infra)/openapi.json/route";
import { GET as readyzGet } from "@/app/(infra)/readyz/route";
import {
  GET as internalRichInfoGet,
  PUT as internalRichInfoPut,
} from "@/app/api/internal/users/[userId]/rich-info/route";
import { GET as metricsGet } from "@/app/api/metrics/route";
import { PUT as selfRichInfoPut } from "@/app/api/v1/self/rich-info/route";
import { GET as userRichInfoGet } from "@/app/api/v1/users/[userId]/rich-info/route";
import type { RouteDefinition } from "@/bootstrap/http";

export const routes: readonly RouteDefinition[] = [
  { method: "GET", path: "/livez", handler: livezGet },
  { method: "GET", path: "/readyz", handler: readyzGet },
  { method: "GET", path: "/openapi.json", handler: openapiGet },
  { method: "GET", path: "/api/metrics", handler: metricsGet },
  {
    method: "GET",
    path: "/api/v1/users/:userId/rich-info",
    handler: userRichInfoGet,
  },
  { method: "PUT", path: "/api/v1/self/rich-info", handler: selfRichInfoPut },
  {
    method: "GET",
    path: "/api/internal/users/:userId/rich-info",
    handler: internalRichInfoGet,
  },
  {
    method: "PUT",
    path: "/api/internal/users/:userId/rich-info",
    handler: internalRichInfoPut,
  },
];
