// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/context-assembler`
 * Purpose: Unit tests for bounded, chronological context loading.
 * Scope: Uses the in-memory history store. Does not test database adapters.
 * Invariants: At most min(N, stored) exchanges; oldest first; bound 0 reads nothing.
 * Side-effects: none (unit tests only)
 * Links: src/features/relay/services/context-assembler.ts
 */

import { FakeClock, InMemoryHistoryStore } from "@tests/_fakes";
import { beforeEach, describe, expect, it } from "vitest";

import { assembleContext } from "@/features/relay/public";
import { PersistenceError } from "@/ports";

describe("assembleContext", () => {
  let clock: FakeClock;
  let history: InMemoryHistoryStore;

  async function seed(userId: number, count: number): Promise<void> {
    for (let i = 1; i <= count; i++) {
      await history.append({
        userId,
        requestText: `q${i}`,
        responseText: `a${i}`,
      });
      clock.advanceSeconds(1);
    }
  }

  beforeEach(() => {
    clock = new FakeClock();
    history = new InMemoryHistoryStore(clock);
  });

  it("returns an empty list for a user with no history", async () => {
    await expect(assembleContext(history, 1, 5)).resolves.toEqual([]);
  });

  it("returns the newest N exchanges oldest first", async () => {
    await seed(1, 4);

    const context = await assembleContext(history, 1, 2);

    expect(context).toEqual([
      { role: "user", content: "q3" },
      { role: "assistant", content: "a3" },
      { role: "user", content: "q4" },
      { role: "assistant", content: "a4" },
    ]);
  });

  it("returns everything when fewer than N exchanges exist", async () => {
    await seed(1, 2);
    const context = await assembleContext(history, 1, 5);
    expect(context.map((m) => m.content)).toEqual(["q1", "a1", "q2", "a2"]);
  });

  it("orders same-timestamp exchanges by id", async () => {
    await history.append({ userId: 1, requestText: "first", responseText: "r1" });
    await history.append({ userId: 1, requestText: "second", responseText: "r2" });

    const context = await assembleContext(history, 1, 5);
    expect(context.map((m) => m.content)).toEqual([
      "first",
      "r1",
      "second",
      "r2",
    ]);
  });

  it("does not read the store when the bound is zero", async () => {
    await seed(1, 3);
    await expect(assembleContext(history, 1, 0)).resolves.toEqual([]);
    expect(history.listCalls).toEqual([]);
  });

  it("never includes another user's exchanges", async () => {
    await seed(1, 2);
    await history.append({ userId: 2, requestText: "other", responseText: "x" });

    const context = await assembleContext(history, 1, 5);
    expect(context.map((m) => m.content)).not.toContain("other");
  });

  it("wraps raw read failures as PersistenceError", async () => {
    history.failures.read = new Error("disk I/O error");

    await expect(assembleContext(history, 1, 5)).rejects.toThrow(
      new PersistenceError("read", new Error("disk I/O error")).message
    );
    await expect(assembleContext(history, 1, 5)).rejects.toBeInstanceOf(
      PersistenceError
    );
  });
});
