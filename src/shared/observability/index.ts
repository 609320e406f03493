// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Observability entry point (structured logging).
 * Scope: Re-exports logging. Does not configure transports.
 * Invariants: none
 * Side-effects: none
 * @public
 */

export {
  flushLogger,
  type Logger,
  logUpdateEnd,
  logUpdateError,
  logUpdateStart,
  makeLogger,
  makeNoopLogger,
  REDACT_PATHS,
} from "./logging";
