// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/replies`
 * Purpose: User-facing texts and reply formatting for the relay bot.
 * Scope: Pure string builders plus chunking for the transport's message limit. Does not send anything.
 * Invariants: Chunks never exceed the limit and never split a surrogate pair; concatenated chunks equal the input.
 * Side-effects: none
 * @public
 */

import { ChatValidationError } from "@/core";
import {
  type InlineButton,
  isPersistenceError,
  type ReplyOptions,
} from "@/ports";

import type { RelayError } from "./services/conversation";

export const TRANSPORT_MESSAGE_LIMIT = 4096;
export const NEW_REQUEST_CALLBACK = "new_request";

export const NEW_REQUEST_BUTTON: InlineButton = {
  text: "🔄 New request",
  callbackData: NEW_REQUEST_CALLBACK,
};

export const WITH_NEW_REQUEST_BUTTON: ReplyOptions = {
  buttons: [[NEW_REQUEST_BUTTON]],
};

export const NON_TEXT_NOTICE = "Please send a text message.";
export const RESET_CALLBACK_ACK = "Conversation history cleared";

export function welcomeText(firstName: string, removed: number): string {
  let text =
    `Hello, ${firstName}! 👋\n\n` +
    "I'm an AI assistant bot.\n" +
    "Just send me any message and I'll reply!\n\n" +
    "Available commands:\n" +
    "/help - show help\n" +
    "/start - start a new conversation";
  if (removed > 0) {
    text += `\n\n✅ History cleared (${removed} messages)`;
  }
  return text;
}

export function helpText(contextBound: number): string {
  const memoryLine =
    contextBound > 0
      ? `🔹 The bot remembers the last ${contextBound} exchanges of the conversation for better answers.`
      : "🔹 Conversation memory is turned off; every message is answered on its own.";
  return (
    "📖 How to use the bot:\n\n" +
    "🔹 Send me any text message and I'll answer it!\n\n" +
    `${memoryLine}\n\n` +
    "🔹 Available commands:\n" +
    "  /start - start a new conversation (clear history)\n" +
    "  /help - show this help\n\n" +
    "🔹 The 'New request' button also clears the conversation history."
  );
}

export function resetConfirmationText(removed: number): string {
  const base =
    "✅ Conversation history cleared!\n\n" +
    "You can start a new conversation. Just send me a message.";
  return removed > 0
    ? `${base}\n\nRemoved messages: ${removed}`
    : `${base}\n\nHistory was empty.`;
}

/**
 * "M min S sec", or "S sec" under a minute.
 */
export function formatWait(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return minutes > 0 ? `${minutes} min ${rest} sec` : `${rest} sec`;
}

function describeWindow(cooldownSeconds: number): string {
  if (cooldownSeconds % 60 === 0) {
    const minutes = cooldownSeconds / 60;
    return minutes === 1 ? "1 minute" : `${minutes} minutes`;
  }
  return formatWait(cooldownSeconds);
}

export function rateLimitedText(
  retryAfterSeconds: number,
  cooldownSeconds: number
): string {
  return (
    "⚠️ In the free gpt-3.5-turbo mode you can send at most one request " +
    `every ${describeWindow(cooldownSeconds)}.\n` +
    `Please wait about ${formatWait(retryAfterSeconds)} and try again.`
  );
}

export function failureText(error: RelayError): string {
  if (error instanceof ChatValidationError) {
    return "⚠️ Please send a non-empty text message.";
  }
  if (isPersistenceError(error)) {
    return (
      "❌ Could not access the conversation history:\n" +
      `${error.message}\n\n` +
      "Please try again in a moment."
    );
  }
  return (
    "❌ An error occurred while processing your request:\n" +
    `${error.message}\n\n` +
    "Try again or use /start to begin a new conversation."
  );
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split text into transport-sized chunks, preferring line breaks past the halfway mark.
 */
export function splitForTransport(
  text: string,
  limit: number = TRANSPORT_MESSAGE_LIMIT
): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    let cut = rest.lastIndexOf("\n", limit - 1);
    if (cut < limit / 2) {
      cut = limit;
      if (isHighSurrogate(rest.charCodeAt(cut - 1))) cut -= 1;
    } else {
      // keep the newline with the earlier chunk
      cut += 1;
    }
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  if (rest.length > 0) chunks.push(rest);
  return chunks;
}
