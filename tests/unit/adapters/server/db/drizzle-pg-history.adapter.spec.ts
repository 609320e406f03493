// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle-pg-history`
 * Purpose: Unit tests for the PostgreSQL history store over a mocked query builder.
 * Scope: Row mapping, query filtering and ordering, limit handling and error wrapping. Does NOT connect to PostgreSQL.
 * Invariants: Driver failures surface as PersistenceError with the failing operation.
 * Side-effects: none (mocked database)
 * Links: src/adapters/server/db/drizzle-pg-history.adapter.ts
 */

import type { SQL } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { describe, expect, it } from "vitest";

import type { PgDatabase } from "@/adapters/server/db/client";
import { DrizzlePgHistoryStore } from "@/adapters/server/db/drizzle-pg-history.adapter";
import { PersistenceError } from "@/ports";

/** Minimal stand-in for the drizzle query builder chain. */
class MockPgDb {
  insertedValues: unknown;
  limitArg: number | undefined;
  whereArg: SQL | undefined;
  orderByArgs: SQL[] = [];

  constructor(private readonly outcome: () => Promise<unknown[]>) {}

  insert() {
    return this;
  }
  values(values: unknown) {
    this.insertedValues = values;
    return this;
  }
  returning() {
    return this.outcome();
  }
  select() {
    return this;
  }
  from() {
    return this;
  }
  where(condition: SQL) {
    this.whereArg = condition;
    return this;
  }
  orderBy(...columns: SQL[]) {
    this.orderByArgs = columns;
    return this;
  }
  limit(limit: number) {
    this.limitArg = limit;
    return this.outcome();
  }
  delete() {
    return this;
  }
}

const CREATED_AT = new Date("2024-01-01T00:00:00.000Z");

const dialect = new PgDialect();

function render(fragment: SQL | undefined) {
  if (!fragment) throw new Error("query fragment was not passed");
  return dialect.sqlToQuery(fragment);
}

const row = {
  id: 11,
  userId: 7,
  messageText: "Hello",
  responseText: "Hi!",
  createdAt: CREATED_AT,
};

function storeWith(outcome: () => Promise<unknown[]>) {
  const db = new MockPgDb(outcome);
  const store = new DrizzlePgHistoryStore(db as unknown as PgDatabase);
  return { db, store };
}

describe("DrizzlePgHistoryStore", () => {
  it("maps the inserted row to an exchange", async () => {
    const { db, store } = storeWith(async () => [row]);

    const exchange = await store.append({
      userId: 7,
      requestText: "Hello",
      responseText: "Hi!",
    });

    expect(db.insertedValues).toEqual({
      userId: 7,
      messageText: "Hello",
      responseText: "Hi!",
    });
    expect(exchange).toEqual({
      id: 11,
      userId: 7,
      requestText: "Hello",
      responseText: "Hi!",
      createdAt: CREATED_AT,
    });
  });

  it("treats an insert without a returned row as a write failure", async () => {
    const { store } = storeWith(async () => []);

    await expect(
      store.append({ userId: 7, requestText: "a", responseText: "b" })
    ).rejects.toThrow("History write failed: Insert returned no row");
  });

  it("passes the limit through and maps rows", async () => {
    const { db, store } = storeWith(async () => [row]);

    const recent = await store.listRecent(7, 3);

    expect(db.limitArg).toBe(3);
    expect(recent.map((e) => e.requestText)).toEqual(["Hello"]);
  });

  it("filters by user and orders newest first with id as tie-breaker", async () => {
    const { db, store } = storeWith(async () => [row]);

    await store.listRecent(7, 5);

    const where = render(db.whereArg);
    expect(where.sql).toBe('"messages"."user_id" = $1');
    expect(where.params.map(String)).toEqual(["7"]);
    expect(db.orderByArgs.map((fragment) => render(fragment).sql)).toEqual([
      '"messages"."created_at" desc',
      '"messages"."id" desc',
    ]);
  });

  it("deletes only the given user's rows", async () => {
    const { db, store } = storeWith(async () => []);

    await store.deleteAllForUser(9);

    const where = render(db.whereArg);
    expect(where.sql).toBe('"messages"."user_id" = $1');
    expect(where.params.map(String)).toEqual(["9"]);
  });

  it("skips the query for a non-positive limit", async () => {
    const { db, store } = storeWith(async () => [row]);

    await expect(store.listRecent(7, 0)).resolves.toEqual([]);
    expect(db.limitArg).toBeUndefined();
  });

  it("counts deleted rows", async () => {
    const { store } = storeWith(async () => [{ id: 1 }, { id: 2 }]);

    await expect(store.deleteAllForUser(7)).resolves.toBe(2);
  });

  it("wraps driver errors with the failing operation", async () => {
    const { store } = storeWith(async () => {
      throw new Error("connection terminated");
    });

    const read = await store.listRecent(7, 5).catch((e: unknown) => e);
    const removed = await store.deleteAllForUser(7).catch((e: unknown) => e);

    expect(read).toBeInstanceOf(PersistenceError);
    expect(read).toMatchObject({
      operation: "read",
      message: "History read failed: connection terminated",
    });
    expect(removed).toMatchObject({ operation: "delete" });
  });
});
