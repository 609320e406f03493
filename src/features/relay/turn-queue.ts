// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/turn-queue`
 * Purpose: Optional per-user serialization of update handling.
 * Scope: Promise-tail lock keyed by user id. Does not bound queue length or time out waiting work.
 * Invariants: Same key runs one task at a time in arrival order; different keys never wait on each other; a failed task releases the lock.
 * Side-effects: none
 * @public
 */

export interface TurnQueue {
  run<T>(key: number, task: () => Promise<T>): Promise<T>;
  /** Keys currently holding or waiting on the lock */
  readonly activeKeys: number;
}

/** Pass-through: every task runs immediately. */
export function createConcurrentTurns(): TurnQueue {
  return {
    run: (_key, task) => task(),
    activeKeys: 0,
  };
}

export function createSerialTurnQueue(): TurnQueue {
  const tails = new Map<number, Promise<void>>();

  return {
    async run<T>(key: number, task: () => Promise<T>): Promise<T> {
      const previousTail = tails.get(key) ?? Promise.resolve();

      let release = () => {};
      const currentGate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const currentTail = previousTail.then(() => currentGate);
      tails.set(key, currentTail);

      await previousTail;
      try {
        return await task();
      } finally {
        release();
        if (tails.get(key) === currentTail) {
          tails.delete(key);
        }
      }
    },
    get activeKeys() {
      return tails.size;
    },
  };
}
