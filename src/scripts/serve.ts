// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@scripts/serve`
 * Purpose: Entry point for the HTTP server process.
 * Scope: Wiring only: validates env, mounts the route table, listens, handles signals. Does not contain route logic.
 * Side-effects: IO (opens a TCP listener, handles signals, closes the database pool on exit)
 * Links: app/routes.ts, bootstrap/http/express.ts
 * @internal
 */

import { closeDb } from "@/adapters/server";
import { routes } from "@/app/routes";
import { createExpressApp } from "@/bootstrap/http";
import { serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

const logger = makeLogger({ component: "http-server" });

async function main(): Promise<void> {
  const env = serverEnv();
  const app = createExpressApp(routes, logger);

  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.APP_ENV }, "http server listening");
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Received shutdown signal");
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await closeDb();
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, "Shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.error({ err: error }, "HTTP server failed to start");
  process.exit(1);
});
