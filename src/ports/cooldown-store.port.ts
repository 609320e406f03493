// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/cooldown-store.port`
 * Purpose: Key-value store with native per-key expiry, used for cooldown markers.
 * Scope: Defines CooldownStore and GateUnavailableError. Does not contain implementations.
 * Invariants: ttlSeconds follows Redis TTL semantics (-2 missing key, -1 no expiry, otherwise remaining whole seconds)
 * Side-effects: none
 * Links: Implemented by adapters/server/cooldown, used by features/relay/services/rate-limiter
 * @public
 */

export class GateUnavailableError extends Error {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cooldown store unavailable: ${detail}`, { cause });
    this.name = "GateUnavailableError";
  }
}

export function isGateUnavailableError(
  error: unknown
): error is GateUnavailableError {
  return error instanceof GateUnavailableError;
}

export interface CooldownStore {
  ttlSeconds(key: string): Promise<number>;

  /** Overwrites the key and resets its expiry. */
  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void>;
}
