// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle-pg-history`
 * Purpose: Drizzle-based HistoryStore for PostgreSQL.
 * Scope: Append, newest-first reads and per-user bulk delete on `messages`. Does not validate text or decide what gets persisted.
 * Invariants: Every driver failure surfaces as PersistenceError; reads order by (created_at DESC, id DESC); queries always filter by user_id.
 * Side-effects: IO (database operations)
 * Links: Implements HistoryStore port
 * @public
 */

import { desc, eq } from "drizzle-orm";

import type { Exchange, NewExchange } from "@/core";
import { type HistoryStore, PersistenceError } from "@/ports";
import { pgSchema } from "@/shared/db";

import type { PgDatabase } from "./client";

const { messages } = pgSchema;

type MessageRow = typeof messages.$inferSelect;

function toExchange(row: MessageRow): Exchange {
  return {
    id: row.id,
    userId: row.userId,
    requestText: row.messageText,
    responseText: row.responseText,
    createdAt: row.createdAt,
  };
}

export class DrizzlePgHistoryStore implements HistoryStore {
  constructor(private readonly db: PgDatabase) {}

  async append(entry: NewExchange): Promise<Exchange> {
    try {
      const [row] = await this.db
        .insert(messages)
        .values({
          userId: entry.userId,
          messageText: entry.requestText,
          responseText: entry.responseText,
        })
        .returning();

      if (!row) {
        throw new Error("Insert returned no row");
      }
      return toExchange(row);
    } catch (error) {
      throw new PersistenceError("write", error);
    }
  }

  async listRecent(userId: number, limit: number): Promise<Exchange[]> {
    if (limit <= 0) return [];
    try {
      const rows = await this.db
        .select()
        .from(messages)
        .where(eq(messages.userId, userId))
        .orderBy(desc(messages.createdAt), desc(messages.id))
        .limit(limit);
      return rows.map(toExchange);
    } catch (error) {
      throw new PersistenceError("read", error);
    }
  }

  async deleteAllForUser(userId: number): Promise<number> {
    try {
      const removed = await this.db
        .delete(messages)
        .where(eq(messages.userId, userId))
        .returning({ id: messages.id });
      return removed.length;
    } catch (error) {
      throw new PersistenceError("delete", error);
    }
  }
}
