// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http`
 * Purpose: HTTP route utilities for bootstrapping.
 * Scope: Re-exports the route wrapper, bearer helpers, error responses and the express bridge.
 * Side-effects: none
 * @public
 */

export { extractBearerToken, hasValidBearer, safeCompare } from "./bearer";
export { errorResponse } from "./errorResponse";
export {
  createExpressApp,
  type HttpMethod,
  type RouteDefinition,
  type RouteHandlerFn,
} from "./express";
export {
  type RouteContext,
  type WrappedRouteHandler,
  wrapRouteHandlerWithLogging,
} from "./wrapRouteHandlerWithLogging";
