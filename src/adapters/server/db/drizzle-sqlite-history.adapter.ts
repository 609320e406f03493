// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle-sqlite-history`
 * Purpose: Drizzle-based HistoryStore for SQLite (better-sqlite3).
 * Scope: Same contract as the PostgreSQL adapter. Does not validate text or decide what gets persisted.
 * Invariants: Every driver failure surfaces as PersistenceError; reads order by (created_at DESC, id DESC).
 * Side-effects: IO (local database file)
 * Notes: better-sqlite3 is synchronous; methods stay async to satisfy the port.
 * Links: Implements HistoryStore port
 * @public
 */

import { desc, eq } from "drizzle-orm";

import type { Exchange, NewExchange } from "@/core";
import { type HistoryStore, PersistenceError } from "@/ports";
import { sqliteSchema } from "@/shared/db";

import type { SqliteDatabase } from "./client";

const { messages } = sqliteSchema;

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

export class DrizzleSqliteHistoryStore implements HistoryStore {
  constructor(private readonly db: SqliteDatabase) {}

  async append(entry: NewExchange): Promise<Exchange> {
    try {
      const row = this.db
        .insert(messages)
        .values({
          userId: entry.userId,
          messageText: entry.requestText,
          responseText: entry.responseText,
        })
        .returning()
        .get();
      return toExchange(row);
    } catch (error) {
      throw new PersistenceError("write", error);
    }
  }

  async listRecent(userId: number, limit: number): Promise<Exchange[]> {
    if (limit <= 0) return [];
    try {
      return this.db
        .select()
        .from(messages)
        .where(eq(messages.userId, userId))
        .orderBy(desc(messages.createdAt), desc(messages.id))
        .limit(limit)
        .all()
        .map(toExchange);
    } catch (error) {
      throw new PersistenceError("read", error);
    }
  }

  async deleteAllForUser(userId: number): Promise<number> {
    try {
      const removed = this.db
        .delete(messages)
        .where(eq(messages.userId, userId))
        .returning({ id: messages.id })
        .all();
      return removed.length;
    } catch (error) {
      throw new PersistenceError("delete", error);
    }
  }
}
