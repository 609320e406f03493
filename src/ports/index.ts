// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces and port-level errors - canonical import surface.
 * Scope: Re-exports public port interfaces and error classes. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling except error classes, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export {
  type ChatTransport,
  type ChatUser,
  type IncomingCallback,
  type IncomingMessage,
  type IncomingUpdate,
  type InlineButton,
  type ReplyOptions,
  TransportError,
} from "./chat-transport.port";
export {
  type CooldownStore,
  GateUnavailableError,
  isGateUnavailableError,
} from "./cooldown-store.port";
export {
  type HistoryStore,
  isPersistenceError,
  PersistenceError,
} from "./history-store.port";
export type {
  CompletionParams,
  LlmCompletionResult,
  LlmService,
  Message,
} from "./llm.port";
