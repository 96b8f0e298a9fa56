// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point, explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Links: Used by features via \@/core alias
 * @public
 */

export type {
  RichField,
  RichInfo,
  RichInfoAccessDecision,
  RichInfoDenyReason,
} from "./rich-info/public";
export {
  decideReadAccess,
  decideSelfWriteAccess,
  DuplicateRichFieldError,
  dropEmptyFields,
  emptyRichInfo,
  ensureAllowed,
  findDuplicateFieldName,
  isDuplicateRichFieldError,
  isRichInfoAccessDeniedError,
  isRichInfoTooLargeError,
  prepareRichInfoUpdate,
  RichInfoAccessDeniedError,
  RichInfoTooLargeError,
  richInfoSize,
} from "./rich-info/public";
