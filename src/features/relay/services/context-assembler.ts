// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/context-assembler`
 * Purpose: Load the bounded conversation window for a user as role-tagged messages.
 * Scope: One history read, reorder to chronological, flatten. Does not write or trim by tokens.
 * Invariants: bound <= 0 performs no read; output is oldest-first; at most 2 * bound messages.
 * Side-effects: IO (via HistoryStore port)
 * Links: core/chat/rules.exchangesToMessages
 * @public
 */

import { exchangesToMessages, type Message } from "@/core";
import {
  type HistoryStore,
  isPersistenceError,
  PersistenceError,
} from "@/ports";

export async function assembleContext(
  history: HistoryStore,
  userId: number,
  bound: number
): Promise<Message[]> {
  if (bound <= 0) return [];

  let newestFirst: Awaited<ReturnType<HistoryStore["listRecent"]>>;
  try {
    newestFirst = await history.listRecent(userId, bound);
  } catch (error) {
    throw isPersistenceError(error)
      ? error
      : new PersistenceError("read", error);
  }

  return exchangesToMessages([...newestFirst].reverse());
}
