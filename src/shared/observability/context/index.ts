// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context`
 * Purpose: Public API for request-scoped context.
 * Side-effects: none
 * @public
 */

export { createRequestContext, sanitizeReqId } from "./factory";
export type { Clock, RequestContext } from "./types";
