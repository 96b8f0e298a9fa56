// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/bearer`
 * Purpose: Bearer token parsing and constant-time comparison for service-to-service routes.
 * Scope: Header parsing and token checks. Does not read env; callers pass the configured token.
 * Invariants: Auth header capped at 512 chars, token at 256; prefix match is case-insensitive; compare is constant-time over SHA-256 digests.
 * Side-effects: none
 * Links: app/api/internal/**, app/api/metrics
 * @public
 */

import { createHash, timingSafeEqual } from "node:crypto";

const MAX_AUTH_HEADER_LENGTH = 512;
const MAX_TOKEN_LENGTH = 256;

/**
 * Both inputs are hashed to fixed 32-byte digests so length never leaks.
 */
export function safeCompare(a: string, b: string): boolean {
  const hashA = createHash("sha256").update(a, "utf8").digest();
  const hashB = createHash("sha256").update(b, "utf8").digest();
  return timingSafeEqual(hashA, hashB);
}

export function extractBearerToken(authHeader: string | null): string | null {
  if (!authHeader) return null;
  if (authHeader.length > MAX_AUTH_HEADER_LENGTH) return null;

  const trimmed = authHeader.trim();
  if (!trimmed.toLowerCase().startsWith("bearer ")) return null;

  const token = trimmed.slice(7).trim();
  if (token.length === 0 || token.length > MAX_TOKEN_LENGTH) return null;

  return token;
}

/**
 * False when no token is configured: an unset secret never authorizes.
 */
export function hasValidBearer(
  request: Request,
  configuredToken: string | undefined
): boolean {
  if (!configuredToken) return false;
  const provided = extractBearerToken(request.headers.get("authorization"));
  return provided !== null && safeCompare(provided, configuredToken);
}
