// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/users.rich-info.internal.v1.contract`
 * Purpose: Contracts for the provisioning endpoints that read and replace any user's rich info.
 * Scope: Reuses the public wire schemas. Internal operations are excluded from the public OpenAPI document.
 * Invariants: Same body shapes as the public operations; bearer auth replaces the team gate.
 * Side-effects: none
 * Links: /api/internal/users/[userId]/rich-info route
 * @internal
 */

import {
  RichInfoWireSchema,
  UserIdParamsSchema,
} from "./users.rich-info.read.v1.contract";
import {
  RichInfoUpdateInputSchema,
  RichInfoUpdateOutputSchema,
} from "./users.rich-info.update.v1.contract";

export const internalRichInfoReadOperation = {
  id: "users.rich-info.internal.read.v1",
  summary: "Read any user's rich info (provisioning)",
  description:
    "Returns the rich info of any user without the team gate. Requires the internal bearer token.",
  input: UserIdParamsSchema,
  output: RichInfoWireSchema,
} as const;

export const internalRichInfoUpdateOperation = {
  id: "users.rich-info.internal.update.v1",
  summary: "Replace any user's rich info (provisioning)",
  description:
    "Replaces the rich info of any existing user with the same validation as the self update. Requires the internal bearer token.",
  input: RichInfoUpdateInputSchema,
  output: RichInfoUpdateOutputSchema,
} as const;
