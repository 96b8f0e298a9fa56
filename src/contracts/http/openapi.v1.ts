// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/http/openapi.v1`
 * Purpose: OpenAPI v3 document generated from the ts-rest router.
 * Scope: Public operations only.
 * Invariants: Operation ids are the router keys.
 * Side-effects: none
 * Links: router.v1.ts, /openapi.json endpoint
 * @internal
 */

import { generateOpenApi } from "@ts-rest/open-api";

import { ApiContractV1 } from "./router.v1";

export const OpenAPIV1 = generateOpenApi(
  ApiContractV1,
  {
    info: {
      title: "Roster Profile API",
      version: "1.0.0",
      description: "Team member rich info profiles.",
    },
  },
  {
    setOperationId: true,
  }
);
