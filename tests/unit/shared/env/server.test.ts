// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Verifies server env validation, defaults and error classification.
 * Scope: serverEnv() against a controlled process.env. Does NOT load .env files.
 * Invariants: Absent required keys are reported as missing, malformed ones as invalid; env is memoized until reset.
 * Side-effects: process.env (restored after each test)
 * Links: src/shared/env/server.ts
 * @public
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_RICH_INFO_LIMIT } from "@/shared/constants";
import { EnvValidationError, resetServerEnv, serverEnv } from "@/shared/env";
import { ENV_KEYS_UNDER_TEST } from "@tests/_fixtures/env/base-env";

function expectEnvError(): EnvValidationError {
  try {
    serverEnv();
  } catch (error) {
    expect(error).toBeInstanceOf(EnvValidationError);
    return error as EnvValidationError;
  }
  throw new Error("expected serverEnv() to throw");
}

describe("shared/env/server", () => {
  const snapshot = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS_UNDER_TEST) snapshot.set(key, process.env[key]);
    resetServerEnv();
  });

  afterEach(() => {
    for (const [key, value] of snapshot) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetServerEnv();
  });

  it("parses the test environment with defaults", () => {
    delete process.env.RICH_INFO_LIMIT;
    delete process.env.PORT;

    const env = serverEnv();

    expect(env.isTestMode).toBe(true);
    expect(env.isTest).toBe(true);
    expect(env.RICH_INFO_LIMIT).toBe(DEFAULT_RICH_INFO_LIMIT);
    expect(env.PORT).toBe(3000);
    expect(env.INTERNAL_API_TOKEN).toBe("x".repeat(32));
  });

  it("coerces RICH_INFO_LIMIT from a string", () => {
    process.env.RICH_INFO_LIMIT = "120";
    expect(serverEnv().RICH_INFO_LIMIT).toBe(120);
  });

  it("memoizes until reset", () => {
    process.env.RICH_INFO_LIMIT = "10";
    expect(serverEnv().RICH_INFO_LIMIT).toBe(10);

    process.env.RICH_INFO_LIMIT = "20";
    expect(serverEnv().RICH_INFO_LIMIT).toBe(10);

    resetServerEnv();
    expect(serverEnv().RICH_INFO_LIMIT).toBe(20);
  });

  it("reports an absent APP_ENV as missing", () => {
    delete process.env.APP_ENV;

    const error = expectEnvError();

    expect(error.meta).toEqual({
      code: "INVALID_ENV",
      missing: ["APP_ENV"],
      invalid: [],
    });
  });

  it("reports malformed values as invalid", () => {
    process.env.RICH_INFO_LIMIT = "-5";
    process.env.INTERNAL_API_TOKEN = "short";

    const error = expectEnvError();

    expect(error.meta.missing).toEqual([]);
    expect([...error.meta.invalid].sort()).toEqual([
      "INTERNAL_API_TOKEN",
      "RICH_INFO_LIMIT",
    ]);
  });

  it("builds DATABASE_URL from component variables", () => {
    delete process.env.DATABASE_URL;
    process.env.POSTGRES_USER = "app";
    process.env.POSTGRES_PASSWORD = "pw";
    process.env.POSTGRES_DB = "roster";
    process.env.DB_HOST = "db";
    process.env.DB_PORT = "6543";

    expect(serverEnv().DATABASE_URL).toBe("postgresql://app:pw@db:6543/roster");
  });

  it("requires DATABASE_URL when the components are incomplete", () => {
    delete process.env.DATABASE_URL;
    delete process.env.DB_HOST;

    expect(expectEnvError().meta.missing).toEqual(["DATABASE_URL"]);
  });
});
