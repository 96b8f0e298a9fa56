// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the server runtime; provides lazy environment access. Does not read .env files.
 * Invariants: All env vars validated on first access; provides boolean flags for runtime and test modes; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV drives adapter wiring (test = in-memory adapters); RICH_INFO_LIMIT is the rich info size budget;
 *        DATABASE_URL taken directly or built from component vars. Lazy init keeps module import side-effect free.
 * Links: bootstrap/container.ts, shared/db/db-url.ts
 * @public
 */

import { ZodError, z } from "zod";

import { DEFAULT_RICH_INFO_LIMIT } from "@/shared/constants";
import { buildDatabaseUrl } from "@/shared/db/db-url";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]),
  DEPLOY_ENVIRONMENT: z.string().optional(),

  // Service identity for observability and postgres application_name
  SERVICE_NAME: z.string().default("roster-profile"),

  // HTTP
  PORT: z.coerce.number().int().positive().default(3000),

  // Database connection: either provide DATABASE_URL directly OR component pieces
  DATABASE_URL: z.string().url().optional(),
  POSTGRES_USER: z.string().min(1).optional(),
  POSTGRES_PASSWORD: z.string().min(1).optional(),
  POSTGRES_DB: z.string().min(1).optional(),
  DB_HOST: z.string().optional(),
  DB_PORT: z.coerce.number().default(5432),

  // Rich info size budget (sum of code points over all names and values)
  RICH_INFO_LIMIT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RICH_INFO_LIMIT),

  // Bearer tokens; routes guarded by an unset token answer 401 (internal) or 500 (metrics)
  INTERNAL_API_TOKEN: z.string().min(32).optional(),
  METRICS_TOKEN: z.string().min(1).optional(),

  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  DATABASE_URL: string;
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

function toValidationError(error: ZodError): EnvValidationError {
  const missing = new Set<string>();
  const invalid = new Set<string>();

  for (const issue of error.issues) {
    const key = issue.path[0]?.toString();
    if (!key) continue;

    if (issue.code === "invalid_type" && issue.received === "undefined") {
      missing.add(key);
    } else {
      invalid.add(key);
    }
  }

  return new EnvValidationError({
    code: "INVALID_ENV",
    missing: [...missing],
    invalid: [...invalid],
  });
}

export function serverEnv(): ServerEnv {
  if (ENV !== null) return ENV;

  let parsed: z.infer<typeof serverSchema>;
  try {
    parsed = serverSchema.parse(process.env);
  } catch (error) {
    if (error instanceof ZodError) throw toValidationError(error);
    throw error;
  }

  let DATABASE_URL: string;
  if (parsed.DATABASE_URL) {
    DATABASE_URL = parsed.DATABASE_URL;
  } else {
    if (
      !parsed.POSTGRES_USER ||
      !parsed.POSTGRES_PASSWORD ||
      !parsed.POSTGRES_DB ||
      !parsed.DB_HOST
    ) {
      throw new EnvValidationError({
        code: "INVALID_ENV",
        missing: ["DATABASE_URL"],
        invalid: [],
      });
    }
    DATABASE_URL = buildDatabaseUrl(parsed);
  }

  ENV = {
    ...parsed,
    DATABASE_URL,
    isDev: parsed.NODE_ENV === "development",
    isTest: parsed.NODE_ENV === "test",
    isProd: parsed.NODE_ENV === "production",
    isTestMode: parsed.APP_ENV === "test",
  };
  return ENV;
}

/**
 * Drop the memoized env so the next serverEnv() call re-reads process.env.
 * For tests only.
 */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
