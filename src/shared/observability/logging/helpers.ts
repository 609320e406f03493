// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/helpers`
 * Purpose: Standardized logging helpers for per-update handling.
 * Scope: Consistent update start/end/error logging. Does not handle domain-specific events.
 * Invariants: Same keys everywhere (updateId, userId, outcome, durationMs, errorCode).
 * Side-effects: IO (emits structured log entries via provided logger)
 * Links: Used by features/relay/handlers
 * @public
 */

import type { Logger } from "pino";

export function logUpdateStart(log: Logger, kind: string): void {
  log.debug({ kind }, "update received");
}

/**
 * @param log - Update-scoped child logger (updateId, userId already bound)
 */
export function logUpdateEnd(
  log: Logger,
  meta: {
    outcome: string;
    durationMs: number;
  }
): void {
  const level = meta.outcome === "failed" ? "warn" : "info";
  log[level](
    { outcome: meta.outcome, durationMs: meta.durationMs },
    "update handled"
  );
}

/**
 * @param errorCode - Stable error code for classification
 */
export function logUpdateError(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  log.error({ err: error, errorCode }, "update failed");
}
