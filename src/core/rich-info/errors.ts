// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/rich-info/errors`
 * Purpose: Rich info domain errors and type guards.
 * Scope: Errors raised by rich info rules and the access gate. Does not handle HTTP status codes.
 * Invariants: Each error carries a stable `code`; access denial carries its reason for logs only, never for responses.
 * Side-effects: none (error definitions only)
 * Links: Used by core rules, features; mapped to HTTP by app routes
 * @public
 */

/**
 * Domain error thrown when an update contains two fields with the same name
 */
export class DuplicateRichFieldError extends Error {
  /** Error code for programmatic handling */
  public readonly code = "DUPLICATE_RICH_FIELD" as const;

  constructor(
    /** The repeated field name */
    public readonly fieldName: string
  ) {
    super(`Duplicate rich info field name: ${fieldName}`);
    this.name = "DuplicateRichFieldError";
  }
}

/**
 * Domain error thrown when the normalized update exceeds the configured size limit
 */
export class RichInfoTooLargeError extends Error {
  /** Error code for programmatic handling */
  public readonly code = "RICH_INFO_TOO_LARGE" as const;

  constructor(
    /** Size of the normalized update */
    public readonly size: number,
    /** Configured maximum */
    public readonly limit: number
  ) {
    super(`Rich info size ${size} exceeds limit ${limit}`);
    this.name = "RichInfoTooLargeError";
  }
}

/**
 * Why the gate denied access. Logged, never returned to the caller.
 */
export type RichInfoDenyReason =
  | "TARGET_NOT_IN_TEAM"
  | "CALLER_NOT_IN_TARGET_TEAM"
  | "CALLER_NOT_IN_TEAM";

/**
 * Domain error thrown when the access gate denies a read or write
 */
export class RichInfoAccessDeniedError extends Error {
  /** Error code for programmatic handling */
  public readonly code = "RICH_INFO_ACCESS_DENIED" as const;

  constructor(public readonly reason: RichInfoDenyReason) {
    super("Insufficient permissions to access rich info");
    this.name = "RichInfoAccessDeniedError";
  }
}

export function isDuplicateRichFieldError(
  error: unknown
): error is DuplicateRichFieldError {
  return (
    error instanceof Error &&
    error.name === "DuplicateRichFieldError" &&
    "code" in error &&
    error.code === "DUPLICATE_RICH_FIELD"
  );
}

export function isRichInfoTooLargeError(
  error: unknown
): error is RichInfoTooLargeError {
  return (
    error instanceof Error &&
    error.name === "RichInfoTooLargeError" &&
    "code" in error &&
    error.code === "RICH_INFO_TOO_LARGE"
  );
}

export function isRichInfoAccessDeniedError(
  error: unknown
): error is RichInfoAccessDeniedError {
  return (
    error instanceof Error &&
    error.name === "RichInfoAccessDeniedError" &&
    "code" in error &&
    error.code === "RICH_INFO_ACCESS_DENIED"
  );
}
