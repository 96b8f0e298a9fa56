// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/rich-info/rich-info.server`
 * Purpose: App-layer coordinator for rich info reads and updates.
 * Scope: Resolves deps, maps wire DTOs to core fields, emits domain events and metrics, propagates domain errors. Does not parse HTTP.
 * Invariants:
 *   - Routes call this, not features/* directly
 *   - Returns exact contract shapes
 *   - Never logs field values
 * Side-effects: IO (via resolved dependencies, logging, metrics)
 * Links: features/rich-info/public.ts, contracts/users.rich-info.*.v1.contract.ts
 * @public
 */

import type { UserId } from "@roster/ids";
import type { z } from "zod";

import { resolveRichInfoDeps } from "@/bootstrap/container";
import type { usersRichInfoReadOperation } from "@/contracts/users.rich-info.read.v1.contract";
import type {
  RichInfoUpdateInput,
  usersRichInfoUpdateOperation,
} from "@/contracts/users.rich-info.update.v1.contract";
import {
  isDuplicateRichFieldError,
  isRichInfoAccessDeniedError,
  isRichInfoTooLargeError,
  type RichField,
  type RichInfo,
} from "@/core";
import {
  type RichInfoWriteResult,
  readRichInfo,
  readRichInfoAsMember,
  replaceRichInfo,
  updateOwnRichInfo,
} from "@/features/rich-info/public";
import type { SessionUser } from "@/shared/auth";
import { RICH_INFO_WIRE_VERSION } from "@/shared/constants";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
  type RichInfoAccessDeniedEvent,
  type RichInfoReadEvent,
  type RichInfoSource,
  type RichInfoUpdatedEvent,
  type RichInfoUpdateOutcome,
  type RichInfoUpdateRejectedEvent,
  richInfoReadsTotal,
  richInfoUpdatesTotal,
} from "@/shared/observability";

type RichInfoOutput = z.infer<typeof usersRichInfoReadOperation.output>;
type RichInfoUpdateOutput = z.infer<
  typeof usersRichInfoUpdateOperation.output
>;

export function toRichFields(input: RichInfoUpdateInput): RichField[] {
  return input.rich_info.fields.map((field) => ({
    name: field.type,
    value: field.value,
  }));
}

export function toRichInfoDto(richInfo: RichInfo): RichInfoOutput {
  return {
    fields: richInfo.fields.map((field) => ({
      type: field.name,
      value: field.value,
    })),
    version: RICH_INFO_WIRE_VERSION,
  };
}

export async function readMemberRichInfo(
  input: { sessionUser: SessionUser; targetUserId: UserId },
  ctx: RequestContext
): Promise<RichInfoOutput> {
  const deps = resolveRichInfoDeps();
  const start = performance.now();

  try {
    const richInfo = await readRichInfoAsMember(deps, {
      callerId: input.sessionUser.id,
      targetId: input.targetUserId,
    });

    recordRead(ctx, "member", input.targetUserId, richInfo, start, {
      callerId: input.sessionUser.id,
    });
    return toRichInfoDto(richInfo);
  } catch (error) {
    if (isRichInfoAccessDeniedError(error)) {
      richInfoReadsTotal.inc({ outcome: "forbidden", source: "member" });
      const event: RichInfoAccessDeniedEvent = {
        reqId: ctx.reqId,
        routeId: ctx.routeId,
        callerId: input.sessionUser.id,
        targetUserId: input.targetUserId,
        operation: "read",
        reason: error.reason,
      };
      logEvent(ctx.log, EVENT_NAMES.RICH_INFO_ACCESS_DENIED, event);
    }
    throw error;
  }
}

export async function readRichInfoForProvisioning(
  input: { targetUserId: UserId },
  ctx: RequestContext
): Promise<RichInfoOutput> {
  const { richInfoRepository } = resolveRichInfoDeps();
  const start = performance.now();

  const richInfo = await readRichInfo(richInfoRepository, input.targetUserId);

  recordRead(ctx, "internal", input.targetUserId, richInfo, start);
  return toRichInfoDto(richInfo);
}

export async function updateOwnRichInfoFacade(
  input: { sessionUser: SessionUser; body: RichInfoUpdateInput },
  ctx: RequestContext
): Promise<RichInfoUpdateOutput> {
  const deps = resolveRichInfoDeps();
  const start = performance.now();
  const targetUserId = input.sessionUser.id;

  try {
    const result = await updateOwnRichInfo(deps, {
      callerId: targetUserId,
      fields: toRichFields(input.body),
    });
    recordUpdated(ctx, "member", targetUserId, result, start);
    return {};
  } catch (error) {
    if (isRichInfoAccessDeniedError(error)) {
      const event: RichInfoAccessDeniedEvent = {
        reqId: ctx.reqId,
        routeId: ctx.routeId,
        callerId: targetUserId,
        targetUserId,
        operation: "write",
        reason: error.reason,
      };
      logEvent(ctx.log, EVENT_NAMES.RICH_INFO_ACCESS_DENIED, event);
      richInfoUpdatesTotal.inc({ outcome: "forbidden", source: "member" });
    } else {
      recordRejected(ctx, "member", targetUserId, error);
    }
    throw error;
  }
}

export async function replaceRichInfoForProvisioning(
  input: { targetUserId: UserId; body: RichInfoUpdateInput },
  ctx: RequestContext
): Promise<RichInfoUpdateOutput> {
  const deps = resolveRichInfoDeps();
  const start = performance.now();

  try {
    const result = await replaceRichInfo(
      deps,
      input.targetUserId,
      toRichFields(input.body)
    );
    recordUpdated(ctx, "internal", input.targetUserId, result, start);
    return {};
  } catch (error) {
    recordRejected(ctx, "internal", input.targetUserId, error);
    throw error;
  }
}

function recordRead(
  ctx: RequestContext,
  source: RichInfoSource,
  targetUserId: UserId,
  richInfo: RichInfo,
  start: number,
  caller: { callerId?: UserId } = {}
): void {
  richInfoReadsTotal.inc({ outcome: "allowed", source });
  const event: RichInfoReadEvent = {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    callerId: caller.callerId,
    targetUserId,
    source,
    fieldCount: richInfo.fields.length,
    durationMs: performance.now() - start,
  };
  logEvent(ctx.log, EVENT_NAMES.RICH_INFO_READ, event);
}

function recordUpdated(
  ctx: RequestContext,
  source: RichInfoSource,
  targetUserId: UserId,
  result: RichInfoWriteResult,
  start: number
): void {
  richInfoUpdatesTotal.inc({ outcome: "stored", source });
  const event: RichInfoUpdatedEvent = {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    targetUserId,
    source,
    fieldCount: result.fields.length,
    droppedEmptyCount: result.droppedEmptyCount,
    size: result.size,
    durationMs: performance.now() - start,
  };
  logEvent(ctx.log, EVENT_NAMES.RICH_INFO_UPDATED, event);
}

/**
 * Only validation rejections are recorded; other errors belong to the route wrapper.
 */
function recordRejected(
  ctx: RequestContext,
  source: RichInfoSource,
  targetUserId: UserId,
  error: unknown
): void {
  let outcome: RichInfoUpdateOutcome;
  let event: RichInfoUpdateRejectedEvent;
  if (isDuplicateRichFieldError(error)) {
    outcome = "duplicate_field";
    event = {
      reqId: ctx.reqId,
      routeId: ctx.routeId,
      targetUserId,
      source,
      errorCode: error.code,
      duplicateName: error.fieldName,
    };
  } else if (isRichInfoTooLargeError(error)) {
    outcome = "too_large";
    event = {
      reqId: ctx.reqId,
      routeId: ctx.routeId,
      targetUserId,
      source,
      errorCode: error.code,
      size: error.size,
      limit: error.limit,
    };
  } else {
    return;
  }

  richInfoUpdatesTotal.inc({ outcome, source });
  logEvent(ctx.log, EVENT_NAMES.RICH_INFO_UPDATE_REJECTED, event);
}
