// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/auth`
 * Purpose: Public surface for session identity types.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export type { SessionUser } from "./session";
