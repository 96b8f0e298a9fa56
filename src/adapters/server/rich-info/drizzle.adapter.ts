// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/rich-info/drizzle`
 * Purpose: PostgreSQL implementation of RichInfoRepository.
 * Scope: One rich_info row per user holding the ordered JSONB field list. Does not validate or authorize.
 * Invariants:
 * - replace() is a single INSERT .. ON CONFLICT DO UPDATE statement: atomic, last-writer-wins
 * - Missing row reads as null; the feature layer turns that into an empty list
 * - FK violation on user_id surfaces as RichInfoOwnerNotFoundPortError
 * Side-effects: IO (database operations)
 * Links: Implements RichInfoRepository port, @roster/db-schema/rich-info
 * @public
 */

import type { UserId } from "@roster/ids";
import { eq } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import { isForeignKeyViolation } from "@/adapters/server/db/pg-errors";
import type { RichField } from "@/core";
import {
  type Clock,
  RichInfoOwnerNotFoundPortError,
  type RichInfoRepository,
} from "@/ports";
import { richInfo } from "@/shared/db";

export class DrizzleRichInfoRepository implements RichInfoRepository {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock
  ) {}

  async get(userId: UserId): Promise<RichField[] | null> {
    const row = await this.db.query.richInfo.findFirst({
      where: eq(richInfo.userId, userId),
      columns: { fields: true },
    });

    if (!row) return null;
    return row.fields.map((field) => ({
      name: field.name,
      value: field.value,
    }));
  }

  async replace(userId: UserId, fields: readonly RichField[]): Promise<void> {
    const rows = fields.map((field) => ({
      name: field.name,
      value: field.value,
    }));
    const updatedAt = new Date(this.clock.now());

    try {
      await this.db
        .insert(richInfo)
        .values({ userId, fields: rows, updatedAt })
        .onConflictDoUpdate({
          target: richInfo.userId,
          set: { fields: rows, updatedAt },
        });
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new RichInfoOwnerNotFoundPortError(userId);
      }
      throw error;
    }
  }
}
