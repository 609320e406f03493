// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/history-store.port`
 * Purpose: Port interface for the durable, user-scoped log of exchanges.
 * Scope: Defines HistoryStore and PersistenceError. Does not contain implementations.
 * Invariants:
 *   - USER_SCOPED: every operation is keyed by userId; no cross-user reads or deletes
 *   - APPEND_ONLY: exchanges are never updated in place
 *   - NEWEST_FIRST: listRecent returns newest first (createdAt desc, id desc)
 * Side-effects: none
 * Links: Implemented by adapters/server/db, used by features/relay
 * @public
 */

import type { Exchange, NewExchange } from "@/core";

/** History read/write failure, wrapping the driver error as `cause`. */
export class PersistenceError extends Error {
  readonly operation: "read" | "write" | "delete";

  constructor(operation: "read" | "write" | "delete", cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`History ${operation} failed: ${detail}`, { cause });
    this.name = "PersistenceError";
    this.operation = operation;
  }
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}

export interface HistoryStore {
  /** Persist one exchange; id and createdAt are assigned by the store. */
  append(exchange: NewExchange): Promise<Exchange>;

  /** Up to `limit` most recent exchanges for the user, newest first. */
  listRecent(userId: number, limit: number): Promise<Exchange[]>;

  /** Delete every exchange of the user. Returns the number removed. */
  deleteAllForUser(userId: number): Promise<number>;
}
