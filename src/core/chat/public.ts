// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/public`
 * Purpose: Public API for chat domain - allowed entry point for features.
 * Scope: Exposes core domain entities and business rules. Does not expose internal implementation details.
 * Invariants: Only exports public domain API
 * Side-effects: none
 * @public
 */

export * from "./model";
export {
  assertRelayableText,
  ChatErrorCode,
  ChatValidationError,
  detectLanguage,
  exchangesToMessages,
  MAX_CONTEXT_EXCHANGES,
} from "./rules";
