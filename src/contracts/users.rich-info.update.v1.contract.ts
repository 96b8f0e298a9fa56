// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/users.rich-info.update.v1.contract`
 * Purpose: Contract for replacing the caller's own rich info.
 * Scope: Zod schema for the update body of PUT /api/v1/self/rich-info. Duplicate and size checks belong to core, not the wire schema.
 * Invariants:
 *   - Update is a full replacement; omitted fields are deleted
 *   - `version` is optional on input and must be 0 when present
 *   - Success body is an empty object
 * Side-effects: none
 * Links: /api/v1/self/rich-info route, core/rich-info/rules.ts
 * @public
 */

import { z } from "zod";

import { RICH_INFO_WIRE_VERSION } from "@/shared/constants";

import { RichFieldWireSchema } from "./users.rich-info.read.v1.contract";

export const RichInfoUpdateInputSchema = z.object({
  rich_info: z.object({
    fields: z.array(RichFieldWireSchema),
    version: z.literal(RICH_INFO_WIRE_VERSION).optional(),
  }),
});

export const RichInfoUpdateOutputSchema = z.object({});

export const usersRichInfoUpdateOperation = {
  id: "users.rich-info.update.v1",
  summary: "Replace own rich info",
  description:
    "Replaces the caller's rich info. Empty-valued fields are dropped. Rejects duplicate field names (400) and payloads over the size limit (413).",
  input: RichInfoUpdateInputSchema,
  output: RichInfoUpdateOutputSchema,
} as const;

export type RichInfoUpdateInput = z.infer<typeof RichInfoUpdateInputSchema>;
export type RichInfoUpdateOutput = z.infer<typeof RichInfoUpdateOutputSchema>;
