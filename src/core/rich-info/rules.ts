// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rich-info/rules`
 * Purpose: Pure validation and normalization rules applied to every rich info write.
 * Scope: Duplicate detection, empty-field removal, size accounting. Does not persist or authorize.
 * Invariants:
 *   - Order: duplicate check on raw input, then drop empty values, then size check on what remains
 *   - Size = sum of code point lengths of every name and value; size equal to the limit is accepted
 *   - Any violation rejects the whole update (no partial result)
 * Side-effects: none
 * Links: core/rich-info/errors
 * @public
 */

import { DuplicateRichFieldError, RichInfoTooLargeError } from "./errors";
import type { RichField } from "./model";

/** Length in Unicode code points, so one emoji counts once. */
function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Returns the first field name that occurs more than once, or null.
 */
export function findDuplicateFieldName(
  fields: readonly RichField[]
): string | null {
  const seen = new Set<string>();
  for (const field of fields) {
    if (seen.has(field.name)) return field.name;
    seen.add(field.name);
  }
  return null;
}

/**
 * Drops fields with an empty value, preserving the order of the rest.
 */
export function dropEmptyFields(fields: readonly RichField[]): RichField[] {
  return fields
    .filter((field) => field.value !== "")
    .map((field) => ({ name: field.name, value: field.value }));
}

export function richInfoSize(fields: readonly RichField[]): number {
  return fields.reduce(
    (total, field) =>
      total + codePointLength(field.name) + codePointLength(field.value),
    0
  );
}

/**
 * Validates a complete replacement field list and returns the list to store.
 *
 * @throws {@link DuplicateRichFieldError} When two input fields share a name
 * @throws {@link RichInfoTooLargeError} When the normalized list exceeds `limit`
 */
export function prepareRichInfoUpdate(
  fields: readonly RichField[],
  limit: number
): RichField[] {
  const duplicate = findDuplicateFieldName(fields);
  if (duplicate !== null) {
    throw new DuplicateRichFieldError(duplicate);
  }

  const normalized = dropEmptyFields(fields);

  const size = richInfoSize(normalized);
  if (size > limit) {
    throw new RichInfoTooLargeError(size, limit);
  }

  return normalized;
}
