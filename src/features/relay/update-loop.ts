// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/update-loop`
 * Purpose: Pull updates from the transport and dispatch each one without blocking the poll.
 * Scope: In-flight tracking and drain on shutdown. Does not interpret updates.
 * Invariants: A failing update is logged and never stops the loop; the returned promise settles only after in-flight updates settle.
 * Side-effects: IO (via ChatTransport and the handler)
 * @public
 */

import type { ChatTransport } from "@/ports";
import { type Logger, logUpdateError } from "@/shared/observability";

import type { UpdateHandler } from "./handlers";

export interface UpdateLoopDeps {
  transport: ChatTransport;
  handle: UpdateHandler;
  log: Logger;
}

export async function runUpdateLoop(
  deps: UpdateLoopDeps,
  signal: AbortSignal
): Promise<void> {
  const inFlight = new Set<Promise<void>>();

  for await (const update of deps.transport.receiveUpdates(signal)) {
    const task: Promise<void> = deps
      .handle(update)
      .catch((error: unknown) => {
        logUpdateError(
          deps.log.child({ updateId: update.updateId, userId: update.user.id }),
          error,
          error instanceof Error ? error.name : "UnknownError"
        );
      })
      .finally(() => {
        inFlight.delete(task);
      });
    inFlight.add(task);
  }

  if (inFlight.size > 0) {
    deps.log.info({ inFlight: inFlight.size }, "relay.loop.draining");
  }
  await Promise.allSettled(inFlight);
}
