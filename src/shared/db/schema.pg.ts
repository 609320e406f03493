// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema.pg`
 * Purpose: PostgreSQL schema for the conversation history table.
 * Scope: Defines `messages`. Does not handle connections or DDL execution.
 * Invariants:
 * - One row per completed exchange; rows are never updated.
 * - user_id is BIGINT (chat platform ids exceed int4) read back as number.
 * - Reads order by (created_at, id) so ties resolve by insertion order.
 * Side-effects: none (schema definitions only)
 * Links: adapters/server/db/drizzle-pg-history.adapter.ts
 * @public
 */

import {
  bigint,
  index,
  pgTable,
  serial,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

export const messages = pgTable(
  "messages",
  {
    id: serial("id").primaryKey(),
    userId: bigint("user_id", { mode: "number" }).notNull(),
    messageText: text("message_text").notNull(),
    responseText: text("response_text"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    userIdIdx: index("ix_messages_user_id").on(table.userId),
  })
);
