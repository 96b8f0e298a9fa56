// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/users.rich-info.read.v1.contract`
 * Purpose: Contract for reading a user's rich info profile fields.
 * Scope: Zod schemas for the rich info wire format and the path params of GET /api/v1/users/:userId/rich-info. Does not contain business logic.
 * Invariants:
 *   - `type` on the wire carries the field name
 *   - `version` is always 0
 *   - Field order is the stored order
 * Side-effects: none
 * Links: /api/v1/users/[userId]/rich-info route, users.rich-info.update.v1.contract
 * @public
 */

import { z } from "zod";

import { RICH_INFO_WIRE_VERSION } from "@/shared/constants";

export const RichFieldWireSchema = z.object({
  type: z.string(),
  value: z.string(),
});

export const RichInfoWireSchema = z.object({
  fields: z.array(RichFieldWireSchema),
  version: z.literal(RICH_INFO_WIRE_VERSION),
});

export const UserIdParamsSchema = z.object({
  userId: z.string().uuid(),
});

export const usersRichInfoReadOperation = {
  id: "users.rich-info.read.v1",
  summary: "Read a user's rich info",
  description:
    "Returns the ordered rich info fields of a user. Allowed only when the caller belongs to the target's team; a user never written returns an empty field list.",
  input: UserIdParamsSchema,
  output: RichInfoWireSchema,
} as const;

export type RichFieldWire = z.infer<typeof RichFieldWireSchema>;
export type RichInfoWire = z.infer<typeof RichInfoWireSchema>;
export type UserIdParams = z.infer<typeof UserIdParamsSchema>;
