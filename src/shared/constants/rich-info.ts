// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/constants/rich-info`
 * Purpose: Rich info limits and wire constants.
 * Scope: Immutable values only.
 * Invariants: RICH_INFO_WIRE_VERSION is the only version this service emits or accepts.
 * Side-effects: none
 * @public
 */

/** Size budget applied when RICH_INFO_LIMIT is unset. */
export const DEFAULT_RICH_INFO_LIMIT = 5000;

/** `version` field of the rich info wire object. */
export const RICH_INFO_WIRE_VERSION = 0;
