// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/client`
 * Purpose: Drizzle client construction for the history store (PostgreSQL or SQLite).
 * Scope: Builds the driver connection, the dialect's HistoryStore, startup DDL and shutdown. Does not handle queries beyond DDL.
 * Invariants:
 *   - Connection details injected, never read from process.env here
 *   - ensureSchema() is idempotent (CREATE ... IF NOT EXISTS)
 *   - close() releases the driver exactly once
 * Side-effects: IO (database connections, DDL)
 * Links: bootstrap/container, shared/db schemas
 * @public
 */

import Database from "better-sqlite3";
import { sql } from "drizzle-orm";
import {
  type BetterSQLite3Database,
  drizzle as drizzleSqlite,
} from "drizzle-orm/better-sqlite3";
import {
  drizzle as drizzlePg,
  type PostgresJsDatabase,
} from "drizzle-orm/postgres-js";
import postgres from "postgres";

import type { HistoryStore } from "@/ports";
import { pgSchema, sqliteSchema } from "@/shared/db";

import { DrizzlePgHistoryStore } from "./drizzle-pg-history.adapter";
import { DrizzleSqliteHistoryStore } from "./drizzle-sqlite-history.adapter";

export type PgDatabase = PostgresJsDatabase<typeof pgSchema>;
export type SqliteDatabase = BetterSQLite3Database<typeof sqliteSchema>;

export type HistoryDbConfig =
  | { kind: "postgresql"; url: string }
  | { kind: "sqlite"; path: string };

export interface HistoryDatabase {
  readonly kind: HistoryDbConfig["kind"];
  readonly store: HistoryStore;
  ensureSchema(): Promise<void>;
  close(): Promise<void>;
}

function createPgDatabase(url: string): HistoryDatabase {
  const client = postgres(url, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: {
      application_name: "chat_relay",
    },
  });
  const db: PgDatabase = drizzlePg(client, { schema: pgSchema });

  return {
    kind: "postgresql",
    store: new DrizzlePgHistoryStore(db),
    async ensureSchema() {
      await db.execute(sql`
        CREATE TABLE IF NOT EXISTS messages (
          id SERIAL PRIMARY KEY,
          user_id BIGINT NOT NULL,
          message_text TEXT NOT NULL,
          response_text TEXT,
          created_at TIMESTAMPTZ NOT NULL DEFAULT now()
        )
      `);
      await db.execute(
        sql`CREATE INDEX IF NOT EXISTS ix_messages_user_id ON messages (user_id)`
      );
    },
    async close() {
      await client.end({ timeout: 5 });
    },
  };
}

export function createSqliteDatabase(path: string): HistoryDatabase {
  const connection = new Database(path);
  const db: SqliteDatabase = drizzleSqlite(connection, {
    schema: sqliteSchema,
  });
  let closed = false;

  return {
    kind: "sqlite",
    store: new DrizzleSqliteHistoryStore(db),
    async ensureSchema() {
      db.run(sql`
        CREATE TABLE IF NOT EXISTS messages (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          user_id INTEGER NOT NULL,
          message_text TEXT NOT NULL,
          response_text TEXT,
          created_at INTEGER NOT NULL
        )
      `);
      db.run(
        sql`CREATE INDEX IF NOT EXISTS ix_messages_user_id ON messages (user_id)`
      );
    },
    async close() {
      if (closed) return;
      closed = true;
      connection.close();
    },
  };
}

export function createHistoryDatabase(
  config: HistoryDbConfig
): HistoryDatabase {
  switch (config.kind) {
    case "postgresql":
      return createPgDatabase(config.url);
    case "sqlite":
      return createSqliteDatabase(config.path);
  }
}
