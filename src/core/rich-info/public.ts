// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rich-info/public`
 * Purpose: Public API for the rich info domain.
 * Scope: Barrel export for rich info entities, rules, gate and errors. Does not expose internal helpers.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Links: Imported by ports, features, and adapters
 * @public
 */

export {
  decideReadAccess,
  decideSelfWriteAccess,
  ensureAllowed,
  type RichInfoAccessDecision,
} from "./access";
export {
  DuplicateRichFieldError,
  isDuplicateRichFieldError,
  isRichInfoAccessDeniedError,
  isRichInfoTooLargeError,
  RichInfoAccessDeniedError,
  type RichInfoDenyReason,
  RichInfoTooLargeError,
} from "./errors";
export type { RichField, RichInfo } from "./model";
export { emptyRichInfo } from "./model";
export {
  dropEmptyFields,
  findDuplicateFieldName,
  prepareRichInfoUpdate,
  richInfoSize,
} from "./rules";
