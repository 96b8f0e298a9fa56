// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rich-info/model`
 * Purpose: Rich info domain entities: user-authored, team-scoped profile fields.
 * Scope: Clean domain types with no infrastructure dependencies. Does not handle persistence or wire format.
 * Invariants: A stored RichInfo has unique field names and no empty values; field order is the user's order.
 * Side-effects: none
 * Notes: Wire format names the field key `type`; the domain calls it `name`. Facades map between them.
 * Links: Used by ports and features, implemented by adapters
 * @public
 */

/**
 * A single profile field, e.g. `{ name: "department", value: "Sales" }`.
 * Names are compared case-sensitively.
 */
export interface RichField {
  name: string;
  value: string;
}

/**
 * Ordered field list for one user.
 * A user that never wrote rich info has `fields: []`.
 */
export interface RichInfo {
  fields: RichField[];
}

export function emptyRichInfo(): RichInfo {
  return { fields: [] };
}
