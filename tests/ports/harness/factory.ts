// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/ports/harness/factory`
 * Purpose: Shared harness lifecycle for port contract suites.
 * Scope: Port testing infrastructure only. Does NOT contain test cases.
 * Invariants: dispose() runs every registered cleanup in registration order.
 * Side-effects: none
 * Links: tests/ports/harness/
 * @internal
 */

export interface TestHarness {
  cleanup: (() => Promise<void>)[];
}

export async function makeHarness(): Promise<TestHarness> {
  return { cleanup: [] };
}

export async function dispose(harness: TestHarness): Promise<void> {
  for (const cleanup of harness.cleanup) {
    await cleanup();
  }
}
