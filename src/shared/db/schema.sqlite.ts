// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema.sqlite`
 * Purpose: SQLite schema for the conversation history table.
 * Scope: Defines `messages` with the same columns as the PostgreSQL variant. Does not handle connections or DDL execution.
 * Invariants: created_at stored as epoch milliseconds; id is AUTOINCREMENT so ids never get reused after deletes.
 * Side-effects: none (schema definitions only)
 * Links: adapters/server/db/drizzle-sqlite-history.adapter.ts
 * @public
 */

import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const messages = sqliteTable(
  "messages",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    userId: integer("user_id").notNull(),
    messageText: text("message_text").notNull(),
    responseText: text("response_text"),
    createdAt: integer("created_at", { mode: "timestamp_ms" })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => ({
    userIdIdx: index("ix_messages_user_id").on(table.userId),
  })
);
