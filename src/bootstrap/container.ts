// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Composition root wiring adapters to ports, selected by environment.
 * Scope: Build the process-wide container lazily. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; config.unhandledErrorPolicy set by env.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Notes: APP_ENV=test wires the in-memory singletons so tests can seed team membership directly.
 *        The database client is only created when production adapters are wired.
 * Links: Used by route wrapper and routes; tests mock getContainer.
 * @public
 */

import type { Logger } from "pino";

import {
  DrizzleRichInfoRepository,
  DrizzleTeamMembershipReader,
  getDb,
  SystemClock,
} from "@/adapters/server";
import {
  getTestRichInfoRepository,
  getTestTeamMembership,
} from "@/adapters/test";
import type {
  Clock,
  RichInfoRepository,
  TeamMembershipReader,
} from "@/ports";
import { serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

export type UnhandledErrorPolicy = "rethrow" | "respond_500";

export interface ContainerConfig {
  /** rethrow for dev/test diagnosis, respond_500 for production */
  unhandledErrorPolicy: UnhandledErrorPolicy;
  /** Maximum rich info size in code points */
  richInfoLimit: number;
  /** Bearer token for /api/internal/**; internal routes answer 401 while unset */
  internalApiToken: string | undefined;
  /** Bearer token for /api/metrics */
  metricsToken: string | undefined;
}

export interface Container {
  log: Logger;
  config: ContainerConfig;
  clock: Clock;
  richInfoRepository: RichInfoRepository;
  teamMembership: TeamMembershipReader;
}

export type RichInfoDeps = Pick<
  Container,
  "richInfoRepository" | "teamMembership"
> & { limit: number };

let _container: Container | null = null;

export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * For tests only: the next getContainer() builds a fresh container.
 */
export function resetContainer(): void {
  _container = null;
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ component: "container" });
  const clock = new SystemClock();

  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      richInfoLimit: env.RICH_INFO_LIMIT,
      internalApiEnabled: env.INTERNAL_API_TOKEN !== undefined,
    },
    "container initialized"
  );

  let richInfoRepository: RichInfoRepository;
  let teamMembership: TeamMembershipReader;
  if (env.isTestMode) {
    richInfoRepository = getTestRichInfoRepository();
    teamMembership = getTestTeamMembership();
  } else {
    const db = getDb();
    richInfoRepository = new DrizzleRichInfoRepository(db, clock);
    teamMembership = new DrizzleTeamMembershipReader(db);
  }

  const config: ContainerConfig = {
    unhandledErrorPolicy: env.isProd ? "respond_500" : "rethrow",
    richInfoLimit: env.RICH_INFO_LIMIT,
    internalApiToken: env.INTERNAL_API_TOKEN,
    metricsToken: env.METRICS_TOKEN,
  };

  return {
    log,
    config,
    clock,
    richInfoRepository,
    teamMembership,
  };
}

export function resolveRichInfoDeps(): RichInfoDeps {
  const container = getContainer();
  return {
    richInfoRepository: container.richInfoRepository,
    teamMembership: container.teamMembership,
    limit: container.config.richInfoLimit,
  };
}
