// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/contract/openapi.v1`
 * Purpose: Verifies the generated OpenAPI document lists the public operations.
 * Scope: Document structure only.
 * Invariants: Internal and metrics routes never appear in the public document.
 * Side-effects: none
 * Links: src/contracts/http/openapi.v1.ts, src/contracts/http/router.v1.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { OpenAPIV1 } from "@/contracts/http/openapi.v1";

describe("OpenAPI v1 document", () => {
  it("carries the API title", () => {
    expect(OpenAPIV1.info.title).toBe("Roster Profile API");
  });

  it("lists the public paths with express params rewritten", () => {
    expect(Object.keys(OpenAPIV1.paths).sort()).toEqual([
      "/api/v1/self/rich-info",
      "/api/v1/users/{userId}/rich-info",
      "/livez",
      "/readyz",
    ]);
  });

  it("uses router keys as operation ids", () => {
    expect(OpenAPIV1.paths["/api/v1/self/rich-info"]?.put?.operationId).toBe(
      "selfRichInfoUpdate"
    );
    expect(
      OpenAPIV1.paths["/api/v1/users/{userId}/rich-info"]?.get?.operationId
    ).toBe("usersRichInfoRead");
  });

  it("documents 413 on the self update", () => {
    expect(
      Object.keys(OpenAPIV1.paths["/api/v1/self/rich-info"]?.put?.responses ?? {})
    ).toContain("413");
  });
});
