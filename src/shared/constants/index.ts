// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/constants`
 * Purpose: Application-wide constants.
 * Scope: Exports immutable values used across layers. Does not contain mutable state.
 * Invariants: Values are immutable and compile-time constant
 * Side-effects: none
 * @public
 */

export {
  DEFAULT_RICH_INFO_LIMIT,
  RICH_INFO_WIRE_VERSION,
} from "./rich-info";
