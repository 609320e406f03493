// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/relay/fake-cooldown-store`
 * Purpose: In-process CooldownStore that mimics Redis TTL semantics on a FakeClock.
 * Scope: TTL reads, SET with EX, failure injection. Does NOT emulate other Redis commands.
 * Invariants: Missing or expired key → -2; key without expiry → -1; otherwise remaining seconds rounded up.
 * Side-effects: none
 * Links: CooldownStore port
 * @public
 */

import type { CooldownStore } from "@/ports";

import { FakeClock } from "../fake-clock";

interface Entry {
  value: string;
  expiresAtMs: number | null;
}

export class FakeCooldownStore implements CooldownStore {
  private entries = new Map<string, Entry>();
  /** Raw error thrown by every call until cleared */
  failure: Error | null = null;
  setCalls: { key: string; value: string; ttlSeconds: number }[] = [];

  constructor(readonly clock: FakeClock = new FakeClock()) {}

  async ttlSeconds(key: string): Promise<number> {
    if (this.failure) throw this.failure;
    const entry = this.entries.get(key);
    if (!entry) return -2;
    if (entry.expiresAtMs === null) return -1;

    const remainingMs = entry.expiresAtMs - this.clock.nowMs();
    if (remainingMs <= 0) {
      this.entries.delete(key);
      return -2;
    }
    return Math.ceil(remainingMs / 1000);
  }

  async setWithExpiry(
    key: string,
    value: string,
    ttlSeconds: number
  ): Promise<void> {
    if (this.failure) throw this.failure;
    this.setCalls.push({ key, value, ttlSeconds });
    this.entries.set(key, {
      value,
      expiresAtMs: this.clock.nowMs() + ttlSeconds * 1000,
    });
  }

  /** Seed a key with no expiry (Redis TTL -1) */
  setPersistent(key: string, value: string): void {
    this.entries.set(key, { value, expiresAtMs: null });
  }

  get(key: string): string | undefined {
    return this.entries.get(key)?.value;
  }
}
