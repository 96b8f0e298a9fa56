// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/express`
 * Purpose: Serve Web-standard route handlers through express.
 * Scope: Converts express requests to `Request`, mounts handlers from a route table, writes `Response` back. Does not contain route logic.
 * Invariants:
 *   - Handlers receive path params as `context.params`, the same shape wrapped handlers expect
 *   - Unknown paths answer 404 and unhandled errors 500, both in the shared error body
 *   - Request bodies are capped at 1mb before any handler runs (413 too-large-rich-info)
 *   - Other client errors raised while reading the body (bad encoding, aborted upload) answer 400 bad-request
 * Side-effects: IO (HTTP)
 * Links: app/routes.ts, wrapRouteHandlerWithLogging.ts
 * @public
 */

import express, {
  type ErrorRequestHandler,
  type Express,
  type Request as ExpressRequest,
  type Response as ExpressResponse,
  type RequestHandler,
} from "express";
import type { Logger } from "pino";

import type { ErrorBody } from "@/contracts/error.rich-info.v1.contract";

import type { RouteContext } from "./wrapRouteHandlerWithLogging";

export type HttpMethod = "GET" | "PUT";

export type RouteHandlerFn = (
  request: Request,
  context?: RouteContext
) => Promise<Response>;

export interface RouteDefinition {
  method: HttpMethod;
  /** express path pattern, e.g. `/api/v1/users/:userId/rich-info` */
  path: string;
  handler: RouteHandlerFn;
}

const BODY_LIMIT = "1mb";

export function toWebRequest(req: ExpressRequest): Request {
  const url = new URL(
    req.originalUrl,
    `${req.protocol}://${req.headers.host ?? "localhost"}`
  );

  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }

  const init: RequestInit = { method: req.method, headers };
  const hasBody = req.method !== "GET" && req.method !== "HEAD";
  if (hasBody && Buffer.isBuffer(req.body)) {
    init.body = req.body.toString("utf8");
  }
  return new Request(url, init);
}

export async function writeWebResponse(
  response: Response,
  res: ExpressResponse
): Promise<void> {
  res.status(response.status);
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  const body = Buffer.from(await response.arrayBuffer());
  res.end(body);
}

function errorBody(
  code: number,
  label: ErrorBody["label"],
  message: string
): ErrorBody {
  return { code, label, message };
}

/** 4xx status carried by a body-parser error, or null for anything else. */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null) return null;
  const status =
    "status" in error
      ? error.status
      : "statusCode" in error
        ? error.statusCode
        : undefined;
  if (typeof status !== "number" || status < 400 || status >= 500) {
    return null;
  }
  return status;
}

export function createExpressApp(
  routes: readonly RouteDefinition[],
  log: Logger
): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.raw({ type: () => true, limit: BODY_LIMIT }));

  for (const route of routes) {
    const handle: RequestHandler = (req, res, next) => {
      const context: RouteContext = { params: Promise.resolve(req.params) };
      route
        .handler(toWebRequest(req), context)
        .then((response) => writeWebResponse(response, res))
        .catch(next);
    };
    if (route.method === "GET") {
      app.get(route.path, handle);
    } else {
      app.put(route.path, handle);
    }
  }

  app.use((_req, res) => {
    res.status(404).json(errorBody(404, "not-found", "Not found"));
  });

  const onError: ErrorRequestHandler = (error, _req, res, _next) => {
    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== null && !res.headersSent) {
      log.warn({ err: error, status: clientStatus }, "rejected request body");
      if (clientStatus === 413) {
        res
          .status(413)
          .json(
            errorBody(413, "too-large-rich-info", "Request body too large")
          );
        return;
      }
      res
        .status(400)
        .json(errorBody(400, "bad-request", "Malformed request body"));
      return;
    }
    log.error({ err: error }, "unhandled error in http bridge");
    if (res.headersSent) {
      res.end();
      return;
    }
    res
      .status(500)
      .json(errorBody(500, "server-error", "Internal server error"));
  };
  app.use(onError);

  return app;
}
