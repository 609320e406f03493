// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/public`
 * Purpose: Public surface of the relay feature for the composition root and entry point.
 * Scope: Re-exports services, handlers and the update loop. Does not export internals such as reply builders' helpers.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export {
  type BotCommand,
  createUpdateHandler,
  parseCommand,
  type RelayHandlerDeps,
  type UpdateHandler,
} from "./handlers";
export {
  CompletionClient,
  type CompletionClientOptions,
  type ReplyGenerator,
} from "./services/completion-client";
export { assembleContext } from "./services/context-assembler";
export {
  type ConversationDeps,
  ConversationCoordinator,
  type RelayError,
  type TurnHooks,
  type TurnInput,
  type TurnOutcome,
  type TurnState,
} from "./services/conversation";
export {
  DEFAULT_COOLDOWN_PREFIX,
  DEFAULT_COOLDOWN_SECONDS,
  FREE_TIER_MODEL,
  type GateState,
  isFreeTierGateActive,
  RateLimiter,
} from "./services/rate-limiter";
export {
  createConcurrentTurns,
  createSerialTurnQueue,
  type TurnQueue,
} from "./turn-queue";
export { runUpdateLoop, type UpdateLoopDeps } from "./update-loop";
