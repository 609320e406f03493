// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/rate-limiter`
 * Purpose: Unit tests for the free-tier cooldown gate.
 * Scope: check/commit semantics over a fake TTL store. Does not test Redis.
 * Invariants: check is side-effect free; commit resets (never stacks) the TTL; store failures become GateUnavailableError.
 * Side-effects: none (unit tests only)
 * Links: src/features/relay/services/rate-limiter.ts
 */

import { FakeClock, FakeCooldownStore } from "@tests/_fakes";
import { beforeEach, describe, expect, it } from "vitest";

import {
  FREE_TIER_MODEL,
  isFreeTierGateActive,
  RateLimiter,
} from "@/features/relay/public";
import { GateUnavailableError } from "@/ports";

describe("RateLimiter", () => {
  let clock: FakeClock;
  let store: FakeCooldownStore;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = new FakeClock();
    store = new FakeCooldownStore(clock);
    limiter = new RateLimiter(store, { ttlSeconds: 180 });
  });

  it("does not block a user without a marker", async () => {
    await expect(limiter.check(42)).resolves.toEqual({
      blocked: false,
      retryAfterSeconds: 0,
    });
  });

  it("reports remaining cooldown after commit and clears once it expires", async () => {
    await limiter.commit(42);

    clock.advanceSeconds(60);
    await expect(limiter.check(42)).resolves.toEqual({
      blocked: true,
      retryAfterSeconds: 120,
    });

    clock.advanceSeconds(121);
    await expect(limiter.check(42)).resolves.toEqual({
      blocked: false,
      retryAfterSeconds: 0,
    });
  });

  it("resets the full TTL on a second commit instead of stacking", async () => {
    await limiter.commit(42);
    clock.advanceSeconds(100);
    await expect(limiter.check(42)).resolves.toMatchObject({
      retryAfterSeconds: 80,
    });

    await limiter.commit(42);
    await expect(limiter.check(42)).resolves.toMatchObject({
      retryAfterSeconds: 180,
    });
  });

  it("writes value 1 under the per-user key", async () => {
    await limiter.commit(42);
    expect(store.setCalls).toEqual([
      { key: "rate_limit:gpt35:user:42", value: "1", ttlSeconds: 180 },
    ]);
  });

  it("never writes during check", async () => {
    await limiter.check(42);
    expect(store.setCalls).toHaveLength(0);
  });

  it("keeps users independent", async () => {
    await limiter.commit(1);
    await expect(limiter.check(2)).resolves.toMatchObject({ blocked: false });
  });

  it("treats a key without expiry as not blocked", async () => {
    store.setPersistent(limiter.keyFor(42), "1");
    await expect(limiter.check(42)).resolves.toEqual({
      blocked: false,
      retryAfterSeconds: 0,
    });
  });

  it("wraps store failures as GateUnavailableError on check and commit", async () => {
    store.failure = new Error("connection refused");

    await expect(limiter.check(42)).rejects.toBeInstanceOf(
      GateUnavailableError
    );
    await expect(limiter.commit(42)).rejects.toThrow(
      "Cooldown store unavailable: connection refused"
    );
  });

  it("honours a custom prefix", async () => {
    const custom = new RateLimiter(store, { ttlSeconds: 30, prefix: "rl" });
    expect(custom.keyFor(7)).toBe("rl:user:7");
  });
});

describe("isFreeTierGateActive", () => {
  it("is active only with the flag on and the free-tier model configured", () => {
    expect(isFreeTierGateActive(true, FREE_TIER_MODEL)).toBe(true);
    expect(isFreeTierGateActive(true, "gpt-4o-mini")).toBe(false);
    expect(isFreeTierGateActive(false, FREE_TIER_MODEL)).toBe(false);
  });
});
