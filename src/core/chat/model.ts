// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/model`
 * Purpose: Domain entities and value objects for the conversation relay.
 * Scope: Pure domain types. Does not handle I/O or time operations.
 * Invariants: Exchange is immutable once created; responseText is null only when no reply was produced
 * Side-effects: none
 * Links: Used by ports, features, and adapters
 * @public
 */

export type MessageRole = "user" | "assistant" | "system";

/** Role-tagged fragment submitted to the completion API. */
export interface Message {
  role: MessageRole;
  content: string;
}

/**
 * One persisted conversational turn.
 * `id` and `createdAt` are assigned by the store.
 */
export interface Exchange {
  readonly id: number;
  readonly userId: number;
  readonly requestText: string;
  readonly responseText: string | null;
  readonly createdAt: Date;
}

export interface NewExchange {
  userId: number;
  requestText: string;
  responseText: string | null;
}

export type DetectedLanguage = "ru" | "unspecified";
