// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/rules`
 * Purpose: Pure business rules for relaying a user message: validation, context flattening, language detection.
 * Scope: Deterministic functions only. Does not handle I/O or time dependencies.
 * Invariants: All functions are pure, deterministic, and idempotent
 * Side-effects: none (throws on validation failure)
 * Links: Used by features/relay services
 * @public
 */

import type { DetectedLanguage, Exchange, Message } from "./model";

/** Upper bound accepted for the context window (in exchanges). */
export const MAX_CONTEXT_EXCHANGES = 20;

export enum ChatErrorCode {
  EMPTY_MESSAGE = "EMPTY_MESSAGE",
}

export class ChatValidationError extends Error {
  constructor(
    public code: ChatErrorCode,
    message: string
  ) {
    super(message);
    this.name = "ChatValidationError";
  }
}

/**
 * Rejects blank text. Length is bounded only by the transport.
 * @throws ChatValidationError
 */
export function assertRelayableText(text: string): void {
  if (text.trim().length === 0) {
    throw new ChatValidationError(
      ChatErrorCode.EMPTY_MESSAGE,
      "Message text is empty"
    );
  }
}

/**
 * Flattens chronologically ordered exchanges into role-tagged fragments.
 * Each exchange yields its user fragment, then its assistant fragment; absent or
 * empty text yields nothing.
 */
export function exchangesToMessages(exchanges: readonly Exchange[]): Message[] {
  const messages: Message[] = [];
  for (const exchange of exchanges) {
    if (exchange.requestText) {
      messages.push({ role: "user", content: exchange.requestText });
    }
    if (exchange.responseText) {
      messages.push({ role: "assistant", content: exchange.responseText });
    }
  }
  return messages;
}

const CYRILLIC_LOWER_FIRST = "а";
const CYRILLIC_LOWER_LAST = "я";

/**
 * Cyrillic heuristic: any lowercase-folded character in а..я, or ё/Ё, marks Russian.
 */
export function detectLanguage(text: string): DetectedLanguage {
  for (const ch of text) {
    if (ch === "ё" || ch === "Ё") return "ru";
    const lower = ch.toLowerCase();
    if (lower >= CYRILLIC_LOWER_FIRST && lower <= CYRILLIC_LOWER_LAST) {
      return "ru";
    }
  }
  return "unspecified";
}
