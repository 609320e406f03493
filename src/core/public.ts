// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by ports, features and adapters via \@/core alias
 * @public
 */

export {
  buildSystemPrompt,
  composeCompletionMessages,
} from "./ai/system-prompt";
export {
  classifyLlmErrorFromStatus,
  CompletionError,
  isCompletionError,
  isLlmError,
  LlmError,
  type LlmErrorKind,
} from "./ai/errors";
export type {
  DetectedLanguage,
  Exchange,
  Message,
  MessageRole,
  NewExchange,
} from "./chat/public";
export {
  assertRelayableText,
  ChatErrorCode,
  ChatValidationError,
  detectLanguage,
  exchangesToMessages,
  MAX_CONTEXT_EXCHANGES,
} from "./chat/public";
