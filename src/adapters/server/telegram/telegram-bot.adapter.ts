// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/telegram/telegram-bot`
 * Purpose: ChatTransport over the Telegram Bot API (HTTPS + fetch).
 * Scope: Long polling via getUpdates plus the reply calls the relay needs. Does not interpret commands or hold conversation state.
 * Invariants:
 *   - Offset advances past every received update, including ones that fail validation
 *   - Non-ok API replies raise TransportError with the API description
 *   - Never logs message text or the bot token
 * Side-effects: IO (HTTP calls to the Bot API)
 * Notes: Replies are sent as plain text (no parse_mode) so model output cannot break entity parsing.
 *        A failed poll backs off for POLL_ERROR_BACKOFF_MS before the next attempt.
 * Links: Implements ChatTransport port
 * @public
 */

import { setTimeout as sleep } from "node:timers/promises";

import { z } from "zod";

import {
  type ChatTransport,
  type IncomingUpdate,
  type ReplyOptions,
  TransportError,
} from "@/ports";
import type { Logger } from "@/shared/observability";

export const POLL_ERROR_BACKOFF_MS = 1000;
const REQUEST_TIMEOUT_MS = 15_000;

export interface TelegramBotConfig {
  token: string;
  apiBaseUrl: string;
  pollTimeoutSeconds: number;
}

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const userSchema = z.object({
  id: z.number(),
  first_name: z.string().default(""),
});

const chatRefSchema = z.object({ id: z.number() });

const updateSchema = z.object({
  update_id: z.number(),
  message: z
    .object({
      message_id: z.number(),
      chat: chatRefSchema,
      from: userSchema.optional(),
      text: z.string().optional(),
    })
    .optional(),
  callback_query: z
    .object({
      id: z.string(),
      from: userSchema,
      data: z.string().optional(),
      message: z
        .object({
          message_id: z.number(),
          chat: chatRefSchema,
        })
        .optional(),
    })
    .optional(),
});

const botUserSchema = z.object({ username: z.string().min(1) });

const updateBatchSchema = z.array(
  z.object({ update_id: z.number() }).passthrough()
);

type RawUpdate = z.infer<typeof updateSchema>;

/**
 * Map a validated Bot API update onto the transport-neutral shape.
 * Returns null for update kinds the relay does not handle.
 */
export function toIncomingUpdate(raw: RawUpdate): IncomingUpdate | null {
  const message = raw.message;
  if (message?.from) {
    return {
      type: "message",
      updateId: raw.update_id,
      chatId: message.chat.id,
      user: { id: message.from.id, firstName: message.from.first_name },
      text: message.text ?? null,
    };
  }

  const callback = raw.callback_query;
  if (callback?.message && callback.data !== undefined) {
    return {
      type: "callback",
      updateId: raw.update_id,
      callbackId: callback.id,
      chatId: callback.message.chat.id,
      messageId: callback.message.message_id,
      user: { id: callback.from.id, firstName: callback.from.first_name },
      data: callback.data,
    };
  }

  return null;
}

function toReplyMarkup(options?: ReplyOptions) {
  if (!options?.buttons) return undefined;
  return {
    inline_keyboard: options.buttons.map((row) =>
      row.map((button) => ({
        text: button.text,
        callback_data: button.callbackData,
      }))
    ),
  };
}

export class TelegramBotAdapter implements ChatTransport {
  private offset = 0;
  private username: string | null = null;

  constructor(
    private readonly config: TelegramBotConfig,
    private readonly log: Logger
  ) {}

  private async call(
    method: string,
    payload: Record<string, unknown>,
    signal: AbortSignal
  ): Promise<unknown> {
    const url = `${this.config.apiBaseUrl.replace(/\/+$/, "")}/bot${this.config.token}/${method}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new TransportError(method, `network error: ${detail}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new TransportError(
        method,
        `unreadable response (HTTP ${response.status})`,
        response.status
      );
    }

    const parsed = apiResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(
        method,
        `malformed response (HTTP ${response.status})`,
        response.status
      );
    }
    if (!parsed.data.ok) {
      throw new TransportError(
        method,
        parsed.data.description ?? `HTTP ${response.status}`,
        parsed.data.error_code ?? response.status
      );
    }
    return parsed.data.result;
  }

  private async fetchUpdates(signal: AbortSignal): Promise<IncomingUpdate[]> {
    const requestSignal = AbortSignal.any([
      signal,
      AbortSignal.timeout(
        this.config.pollTimeoutSeconds * 1000 + REQUEST_TIMEOUT_MS
      ),
    ]);
    const result = await this.call(
      "getUpdates",
      {
        offset: this.offset,
        timeout: this.config.pollTimeoutSeconds,
        allowed_updates: ["message", "callback_query"],
      },
      requestSignal
    );

    const batch = updateBatchSchema.safeParse(result);
    if (!batch.success) {
      throw new TransportError("getUpdates", "result is not an update list");
    }

    const updates: IncomingUpdate[] = [];
    for (const item of batch.data) {
      this.offset = Math.max(this.offset, item.update_id + 1);
      const parsed = updateSchema.safeParse(item);
      if (!parsed.success) {
        this.log.warn(
          { updateId: item.update_id },
          "telegram.update_invalid"
        );
        continue;
      }
      const update = toIncomingUpdate(parsed.data);
      if (update) {
        updates.push(update);
      } else {
        this.log.debug({ updateId: item.update_id }, "telegram.update_skipped");
      }
    }
    return updates;
  }

  async *receiveUpdates(signal: AbortSignal): AsyncIterable<IncomingUpdate> {
    while (!signal.aborted) {
      let updates: IncomingUpdate[];
      try {
        updates = await this.fetchUpdates(signal);
      } catch (error) {
        if (signal.aborted) return;
        this.log.warn({ err: error }, "telegram.poll_failed");
        try {
          await sleep(POLL_ERROR_BACKOFF_MS, undefined, { signal });
        } catch {
          return;
        }
        continue;
      }
      yield* updates;
    }
  }

  async sendMessage(
    chatId: number,
    text: string,
    options?: ReplyOptions
  ): Promise<void> {
    await this.call(
      "sendMessage",
      {
        chat_id: chatId,
        text,
        reply_markup: toReplyMarkup(options),
      },
      AbortSignal.timeout(REQUEST_TIMEOUT_MS)
    );
  }

  async sendTyping(chatId: number): Promise<void> {
    await this.call(
      "sendChatAction",
      { chat_id: chatId, action: "typing" },
      AbortSignal.timeout(REQUEST_TIMEOUT_MS)
    );
  }

  async editMessage(
    chatId: number,
    messageId: number,
    text: string,
    options?: ReplyOptions
  ): Promise<void> {
    await this.call(
      "editMessageText",
      {
        chat_id: chatId,
        message_id: messageId,
        text,
        reply_markup: toReplyMarkup(options),
      },
      AbortSignal.timeout(REQUEST_TIMEOUT_MS)
    );
  }

  async answerCallback(callbackId: string, text?: string): Promise<void> {
    await this.call(
      "answerCallbackQuery",
      { callback_query_id: callbackId, text },
      AbortSignal.timeout(REQUEST_TIMEOUT_MS)
    );
  }

  /** Cached after the first successful getMe. */
  async getBotUsername(): Promise<string> {
    if (this.username === null) {
      const result = await this.call(
        "getMe",
        {},
        AbortSignal.timeout(REQUEST_TIMEOUT_MS)
      );
      const parsed = botUserSchema.safeParse(result);
      if (!parsed.success) {
        throw new TransportError("getMe", "result has no username");
      }
      this.username = parsed.data.username;
    }
    return this.username;
  }
}
