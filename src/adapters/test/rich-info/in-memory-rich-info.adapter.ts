// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/rich-info/in-memory-rich-info`
 * Purpose: In-memory RichInfoRepository for APP_ENV=test wiring and unit tests.
 * Scope: Map-backed storage with the same replace/get semantics as the Drizzle adapter. Does not validate.
 * Invariants: Stores and returns copies, so callers can never mutate stored state; replace is a single Map.set (last-writer-wins).
 * Side-effects: none (in-memory only)
 * Notes: Use getTestRichInfoRepository() for the process-wide instance the container wires in test mode.
 * Links: Implements RichInfoRepository port
 * @public
 */

import type { UserId } from "@roster/ids";

import type { RichField } from "@/core";
import type { Clock, RichInfoRepository } from "@/ports";

interface StoredRichInfo {
  fields: RichField[];
  updatedAt: string;
}

function copyFields(fields: readonly RichField[]): RichField[] {
  return fields.map((field) => ({ name: field.name, value: field.value }));
}

export class InMemoryRichInfoRepository implements RichInfoRepository {
  private readonly rows = new Map<UserId, StoredRichInfo>();

  constructor(private readonly clock: Clock) {}

  async get(userId: UserId): Promise<RichField[] | null> {
    const row = this.rows.get(userId);
    return row ? copyFields(row.fields) : null;
  }

  async replace(userId: UserId, fields: readonly RichField[]): Promise<void> {
    this.rows.set(userId, {
      fields: copyFields(fields),
      updatedAt: this.clock.now(),
    });
  }

  /** Test helper: timestamp of the last replace, or null. */
  lastUpdatedAt(userId: UserId): string | null {
    return this.rows.get(userId)?.updatedAt ?? null;
  }

  clear(): void {
    this.rows.clear();
  }
}

const wallClock: Clock = { now: () => new Date().toISOString() };

let _testRepository: InMemoryRichInfoRepository | null = null;

/**
 * Process-wide repository shared by the test-mode container and tests.
 */
export function getTestRichInfoRepository(): InMemoryRichInfoRepository {
  _testRepository ??= new InMemoryRichInfoRepository(wallClock);
  return _testRepository;
}

export function resetTestRichInfoRepository(): void {
  _testRepository?.clear();
}
