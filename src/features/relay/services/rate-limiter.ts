// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/rate-limiter`
 * Purpose: Per-user cooldown gate for the free-tier model (at most one completed turn per cooldown window).
 * Scope: check() reads the remaining cooldown; commit() (re)starts it. Does not decide when to commit; the coordinator does.
 * Invariants:
 *   - check() is side-effect free
 *   - commit() resets the full TTL; repeated commits never stack
 *   - Any store failure surfaces as GateUnavailableError
 * Side-effects: IO (via CooldownStore port)
 * Links: ports/cooldown-store.port, features/relay/services/conversation
 * @public
 */

import {
  type CooldownStore,
  GateUnavailableError,
  isGateUnavailableError,
} from "@/ports";

export const FREE_TIER_MODEL = "gpt-3.5-turbo";
export const DEFAULT_COOLDOWN_PREFIX = "rate_limit:gpt35";
export const DEFAULT_COOLDOWN_SECONDS = 180;

/** Gate applies only when free mode is on and the primary model is the free-tier model. */
export function isFreeTierGateActive(
  freeVersionEnabled: boolean,
  configuredModel: string
): boolean {
  return freeVersionEnabled && configuredModel === FREE_TIER_MODEL;
}

export interface GateState {
  blocked: boolean;
  retryAfterSeconds: number;
}

export interface RateLimiterOptions {
  ttlSeconds?: number;
  prefix?: string;
}

function toGateError(error: unknown): GateUnavailableError {
  return isGateUnavailableError(error) ? error : new GateUnavailableError(error);
}

export class RateLimiter {
  readonly ttlSeconds: number;
  private readonly prefix: string;

  constructor(
    private readonly store: CooldownStore,
    options: RateLimiterOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_COOLDOWN_SECONDS;
    this.prefix = options.prefix ?? DEFAULT_COOLDOWN_PREFIX;
  }

  keyFor(userId: number): string {
    return `${this.prefix}:user:${userId}`;
  }

  async check(userId: number): Promise<GateState> {
    let ttl: number;
    try {
      ttl = await this.store.ttlSeconds(this.keyFor(userId));
    } catch (error) {
      throw toGateError(error);
    }
    // -2 (missing) and -1 (no expiry) both count as not blocked
    if (ttl > 0) {
      return { blocked: true, retryAfterSeconds: ttl };
    }
    return { blocked: false, retryAfterSeconds: 0 };
  }

  async commit(userId: number): Promise<void> {
    try {
      await this.store.setWithExpiry(this.keyFor(userId), "1", this.ttlSeconds);
    } catch (error) {
      throw toGateError(error);
    }
  }
}
