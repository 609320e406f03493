// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/cooldown/upstash-cooldown`
 * Purpose: CooldownStore over Redis using the Upstash REST client.
 * Scope: TTL lookup and SET with EX. Does not build keys or decide gating policy.
 * Invariants: ttlSeconds returns the raw Redis TTL reply; setWithExpiry overwrites value and expiry in one command.
 * Side-effects: IO (HTTP calls to the Redis REST endpoint)
 * Notes: Client errors propagate unchanged; the rate limiter wraps them as GateUnavailableError.
 * Links: Implements CooldownStore port
 * @public
 */

import { Redis } from "@upstash/redis";

import type { CooldownStore } from "@/ports";

export interface UpstashCooldownConfig {
  url: string;
  token: string;
}

export function createRedisClient(config: UpstashCooldownConfig): Redis {
  return new Redis({ url: config.url, token: config.token });
}

export class UpstashCooldownStore implements CooldownStore {
  constructor(private readonly redis: Redis) {}

  async ttlSeconds(key: string): Promise<number> {
    return await this.redis.ttl(key);
  }

  async setWithExpiry(
    key: string,
    value: string,
    ttlSeconds: number
  ): Promise<void> {
    await this.redis.set(key, value, { ex: ttlSeconds });
  }
}
