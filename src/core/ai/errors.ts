// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/ai/errors`
 * Purpose: Domain error types for LLM failures.
 * Scope: Defines LlmError (single attempt failed), CompletionError (every model failed) and status classification. Does not perform IO or logging.
 * Invariants:
 *   - LlmError captures kind + optional HTTP status at throw site (adapter boundary)
 *   - CompletionError always carries the last attempt's error as `cause`
 * Side-effects: none
 * Links: Thrown by adapters/server/ai, wrapped by features/relay/services/completion-client
 * @public
 */

/**
 * Error classification kinds for LLM failures.
 * Derived from HTTP status codes at adapter boundary.
 */
export type LlmErrorKind =
  | "timeout"
  | "rate_limited"
  | "provider_4xx"
  | "provider_5xx"
  | "empty_response"
  | "aborted"
  | "unknown";

export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: LlmErrorKind, status?: number) {
    super(message);
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }
}

export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}

/**
 * Raised when no configured model produced a completion.
 */
export class CompletionError extends Error {
  readonly attemptedModels: readonly string[];

  constructor(attemptedModels: readonly string[], cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Completion API request failed: ${detail}`, { cause });
    this.name = "CompletionError";
    this.attemptedModels = attemptedModels;
  }
}

export function isCompletionError(error: unknown): error is CompletionError {
  return error instanceof CompletionError;
}
