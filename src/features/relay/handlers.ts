// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/handlers`
 * Purpose: Map transport updates onto conversation operations and replies.
 * Scope: /start, /help, the new-request callback, non-text messages and relayed text. Does not poll or own transport lifetime.
 * Invariants:
 *   - Every relay outcome produces exactly one user-visible reply (possibly chunked)
 *   - The "New request" button rides on the last chunk only
 *   - Typing indicator is sent only after the gate passes
 * Side-effects: IO (via ChatTransport and the coordinator)
 * Links: features/relay/services/conversation, features/relay/replies
 * @public
 */

import {
  type ChatTransport,
  type IncomingCallback,
  type IncomingMessage,
  type IncomingUpdate,
  isPersistenceError,
  type ReplyOptions,
} from "@/ports";
import {
  type Logger,
  logUpdateEnd,
  logUpdateStart,
} from "@/shared/observability";

import {
  failureText,
  helpText,
  NEW_REQUEST_CALLBACK,
  NON_TEXT_NOTICE,
  RESET_CALLBACK_ACK,
  rateLimitedText,
  resetConfirmationText,
  splitForTransport,
  WITH_NEW_REQUEST_BUTTON,
  welcomeText,
} from "./replies";
import type { ConversationCoordinator } from "./services/conversation";
import type { TurnQueue } from "./turn-queue";

export type BotCommand = "start" | "help";

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?(?:\s|$)/;
const ADDRESSED_COMMAND = /^\/[A-Za-z0-9_]+@/;

/**
 * Recognise `/start` and `/help`, bare or addressed to `botUsername`.
 * Commands addressed to another bot, unknown commands and plain text
 * are relayed as text.
 */
export function parseCommand(
  text: string,
  botUsername?: string
): BotCommand | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) return null;

  const mention = match[2];
  if (
    mention !== undefined &&
    mention.toLowerCase() !== botUsername?.toLowerCase()
  ) {
    return null;
  }

  const name = match[1]?.toLowerCase();
  return name === "start" || name === "help" ? name : null;
}

export interface RelayHandlerDeps {
  coordinator: ConversationCoordinator;
  transport: ChatTransport;
  turns: TurnQueue;
  contextBound: number;
  cooldownSeconds: number;
  log: Logger;
}

export type UpdateHandler = (update: IncomingUpdate) => Promise<void>;

export function createUpdateHandler(deps: RelayHandlerDeps): UpdateHandler {
  const { coordinator, transport } = deps;

  async function reply(
    chatId: number,
    text: string,
    options?: ReplyOptions
  ): Promise<void> {
    const chunks = splitForTransport(text);
    for (const [index, chunk] of chunks.entries()) {
      const isLast = index === chunks.length - 1;
      await transport.sendMessage(chatId, chunk, isLast ? options : undefined);
    }
  }

  async function resetOrNotify(
    chatId: number,
    userId: number
  ): Promise<number | null> {
    try {
      return await coordinator.resetConversation(userId);
    } catch (error) {
      if (!isPersistenceError(error)) throw error;
      await reply(chatId, failureText(error));
      return null;
    }
  }

  async function handleStart(message: IncomingMessage): Promise<string> {
    const removed = await resetOrNotify(message.chatId, message.user.id);
    if (removed === null) return "failed";
    await reply(
      message.chatId,
      welcomeText(message.user.firstName, removed),
      WITH_NEW_REQUEST_BUTTON
    );
    return "start";
  }

  async function handleText(
    message: IncomingMessage,
    text: string
  ): Promise<string> {
    const outcome = await coordinator.handleMessage(
      { userId: message.user.id, text },
      { onAccepted: () => transport.sendTyping(message.chatId) }
    );

    switch (outcome.kind) {
      case "replied":
        await reply(message.chatId, outcome.response, WITH_NEW_REQUEST_BUTTON);
        break;
      case "rate_limited":
        await reply(
          message.chatId,
          rateLimitedText(outcome.retryAfterSeconds, deps.cooldownSeconds)
        );
        break;
      case "failed":
        await reply(message.chatId, failureText(outcome.error));
        break;
    }
    return outcome.kind;
  }

  async function handleMessage(message: IncomingMessage): Promise<string> {
    const text = message.text;
    if (text === null) {
      await reply(message.chatId, NON_TEXT_NOTICE);
      return "non_text";
    }

    const botUsername = ADDRESSED_COMMAND.test(text.trim())
      ? await transport.getBotUsername()
      : undefined;

    switch (parseCommand(text, botUsername)) {
      case "start":
        return await handleStart(message);
      case "help":
        await reply(
          message.chatId,
          helpText(deps.contextBound),
          WITH_NEW_REQUEST_BUTTON
        );
        return "help";
      case null:
        return await handleText(message, text);
    }
  }

  async function handleCallback(callback: IncomingCallback): Promise<string> {
    if (callback.data !== NEW_REQUEST_CALLBACK) {
      await transport.answerCallback(callback.callbackId);
      return "callback_ignored";
    }

    const removed = await resetOrNotify(callback.chatId, callback.user.id);
    if (removed === null) {
      await transport.answerCallback(callback.callbackId);
      return "failed";
    }
    await transport.editMessage(
      callback.chatId,
      callback.messageId,
      resetConfirmationText(removed),
      WITH_NEW_REQUEST_BUTTON
    );
    await transport.answerCallback(callback.callbackId, RESET_CALLBACK_ACK);
    return "reset";
  }

  return (update) =>
    deps.turns.run(update.user.id, async () => {
      const log = deps.log.child({
        updateId: update.updateId,
        userId: update.user.id,
      });
      const start = performance.now();
      logUpdateStart(log, update.type);

      const outcome =
        update.type === "message"
          ? await handleMessage(update)
          : await handleCallback(update);

      logUpdateEnd(log, {
        outcome,
        durationMs: Math.round(performance.now() - start),
      });
    });
}
