// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rich-info/public`
 * Purpose: Single entrypoint for the rich info feature.
 * Scope: Re-exports services and error contracts for the app layer.
 * Invariants: App code imports from here, never from services/*.
 * Side-effects: none
 * @public
 */

export type { RichInfoFeatureError } from "./errors";
export {
  isRichInfoFeatureError,
  mapRichInfoPortErrorToFeature,
} from "./errors";
export {
  type MemberReadInput,
  type RichInfoReadDeps,
  readRichInfo,
  readRichInfoAsMember,
} from "./services/readRichInfo";
export {
  type RichInfoWriteDeps,
  type RichInfoWriteResult,
  replaceRichInfo,
  type SelfWriteDeps,
  updateOwnRichInfo,
} from "./services/updateRichInfo";
