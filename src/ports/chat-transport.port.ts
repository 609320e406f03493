// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/chat-transport.port`
 * Purpose: Chat transport abstraction (receive user updates, send replies).
 * Scope: Transport-neutral update and reply shapes. Does not parse commands or hold conversation state.
 * Invariants: Updates are yielded in the order the transport delivers them; text is null for non-text messages
 * Side-effects: none (interface only)
 * Links: Implemented by adapters/server/telegram, consumed by features/relay/handlers
 * @public
 */

export interface ChatUser {
  readonly id: number;
  readonly firstName: string;
}

export interface IncomingMessage {
  readonly type: "message";
  readonly updateId: number;
  readonly chatId: number;
  readonly user: ChatUser;
  readonly text: string | null;
}

export interface IncomingCallback {
  readonly type: "callback";
  readonly updateId: number;
  readonly callbackId: string;
  readonly chatId: number;
  readonly messageId: number;
  readonly user: ChatUser;
  readonly data: string;
}

export type IncomingUpdate = IncomingMessage | IncomingCallback;

export interface InlineButton {
  readonly text: string;
  readonly callbackData: string;
}

export interface ReplyOptions {
  /** Rows of inline buttons attached under the message */
  readonly buttons?: readonly (readonly InlineButton[])[];
}

/** Raised when the transport API rejects a call. */
export class TransportError extends Error {
  readonly method: string;
  readonly status: number | undefined;

  constructor(method: string, message: string, status?: number) {
    super(`${method} failed: ${message}`);
    this.name = "TransportError";
    this.method = method;
    this.status = status;
  }
}

export interface ChatTransport {
  /** Long-lived stream of updates; ends when `signal` aborts. */
  receiveUpdates(signal: AbortSignal): AsyncIterable<IncomingUpdate>;

  sendMessage(chatId: number, text: string, options?: ReplyOptions): Promise<void>;

  sendTyping(chatId: number): Promise<void>;

  editMessage(
    chatId: number,
    messageId: number,
    text: string,
    options?: ReplyOptions
  ): Promise<void>;

  answerCallback(callbackId: string, text?: string): Promise<void>;

  /** Username of the bot account, without the leading "@". */
  getBotUsername(): Promise<string>;
}
