// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/conversation`
 * Purpose: Per-message turn orchestration (gate, context, completion, persist, commit) and conversation reset.
 * Scope: Coordinates ports and relay services; returns a TurnOutcome instead of throwing. Does not format user-facing text or talk to the transport.
 * Invariants:
 *   - States advance RECEIVED → GATE_CHECKED → CONTEXT_LOADED → COMPLETED → PERSISTED → GATE_COMMITTED; any failure ends in ERRORED
 *   - Failed turns persist nothing and never commit the gate
 *   - Cooldown is committed only after the exchange is persisted
 *   - Gate store failures fail open: the turn runs ungated and skips commit
 *   - Commit failures after persistence are logged and swallowed
 *   - Reset touches only the given user's exchanges
 * Side-effects: IO (via ports)
 * Notes: Only error kinds and counts are logged, never message text.
 * Links: features/relay/handlers
 * @public
 */

import {
  assertRelayableText,
  ChatValidationError,
  CompletionError,
  isCompletionError,
} from "@/core";
import {
  type HistoryStore,
  isGateUnavailableError,
  isPersistenceError,
  PersistenceError,
} from "@/ports";
import type { Logger } from "@/shared/observability";

import type { ReplyGenerator } from "./completion-client";
import { assembleContext } from "./context-assembler";
import type { RateLimiter } from "./rate-limiter";

export type TurnState =
  | "RECEIVED"
  | "GATE_CHECKED"
  | "CONTEXT_LOADED"
  | "COMPLETED"
  | "PERSISTED"
  | "GATE_COMMITTED"
  | "ERRORED";

export type RelayError = ChatValidationError | PersistenceError | CompletionError;

export type TurnOutcome =
  | { kind: "rate_limited"; retryAfterSeconds: number }
  | {
      kind: "replied";
      response: string;
      exchangeId: number;
      state: "PERSISTED" | "GATE_COMMITTED";
    }
  | { kind: "failed"; error: RelayError; state: "ERRORED" };

export interface TurnInput {
  userId: number;
  text: string;
}

export interface TurnHooks {
  /** Runs once the gate has passed, before the completion call. */
  onAccepted?: () => Promise<void> | void;
}

export interface ConversationDeps {
  history: HistoryStore;
  completion: ReplyGenerator;
  /** null when the free-tier gate is inactive */
  limiter: RateLimiter | null;
  contextBound: number;
  log: Logger;
}

export class ConversationCoordinator {
  constructor(private readonly deps: ConversationDeps) {}

  async handleMessage(
    input: TurnInput,
    hooks: TurnHooks = {}
  ): Promise<TurnOutcome> {
    const log = this.deps.log.child({ userId: input.userId });
    let state: TurnState = "RECEIVED";

    try {
      assertRelayableText(input.text);
    } catch (error) {
      if (error instanceof ChatValidationError) {
        log.info({ code: error.code }, "relay.turn.rejected");
        return { kind: "failed", error, state: "ERRORED" };
      }
      throw error;
    }

    // Gate: check only; commit happens after persistence
    let gated = false;
    const limiter = this.deps.limiter;
    if (limiter) {
      try {
        const gate = await limiter.check(input.userId);
        if (gate.blocked) {
          log.info(
            { retryAfterSeconds: gate.retryAfterSeconds },
            "relay.turn.rate_limited"
          );
          return {
            kind: "rate_limited",
            retryAfterSeconds: gate.retryAfterSeconds,
          };
        }
        gated = true;
      } catch (error) {
        if (!isGateUnavailableError(error)) throw error;
        log.warn({ err: error }, "relay.gate.unavailable_fail_open");
      }
    }
    state = "GATE_CHECKED";

    if (hooks.onAccepted) {
      try {
        await hooks.onAccepted();
      } catch (error) {
        log.warn({ err: error }, "relay.turn.on_accepted_failed");
      }
    }

    try {
      const context = await assembleContext(
        this.deps.history,
        input.userId,
        this.deps.contextBound
      );
      state = "CONTEXT_LOADED";

      const response = await this.generate(input.text, context);
      state = "COMPLETED";

      const exchange = await this.persist(input, response);
      state = "PERSISTED";

      if (gated && limiter) {
        try {
          await limiter.commit(input.userId);
          state = "GATE_COMMITTED";
        } catch (error) {
          log.warn({ err: error }, "relay.gate.commit_failed");
        }
      }

      log.info(
        { exchangeId: exchange.id, contextMessages: context.length, state },
        "relay.turn.replied"
      );
      return {
        kind: "replied",
        response,
        exchangeId: exchange.id,
        state: state === "GATE_COMMITTED" ? "GATE_COMMITTED" : "PERSISTED",
      };
    } catch (error) {
      if (isPersistenceError(error) || isCompletionError(error)) {
        log.warn(
          { errorName: error.name, failedAfter: state },
          "relay.turn.failed"
        );
        return { kind: "failed", error, state: "ERRORED" };
      }
      throw error;
    }
  }

  async resetConversation(userId: number): Promise<number> {
    let removed: number;
    try {
      removed = await this.deps.history.deleteAllForUser(userId);
    } catch (error) {
      throw isPersistenceError(error)
        ? error
        : new PersistenceError("delete", error);
    }
    this.deps.log.info({ userId, removed }, "relay.conversation.reset");
    return removed;
  }

  private async generate(
    text: string,
    context: Awaited<ReturnType<typeof assembleContext>>
  ): Promise<string> {
    try {
      return await this.deps.completion.generate(text, context);
    } catch (error) {
      throw isCompletionError(error) ? error : new CompletionError([], error);
    }
  }

  private async persist(input: TurnInput, response: string) {
    try {
      return await this.deps.history.append({
        userId: input.userId,
        requestText: input.text,
        responseText: response,
      });
    } catch (error) {
      throw isPersistenceError(error)
        ? error
        : new PersistenceError("write", error);
    }
  }
}
