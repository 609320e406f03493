// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/llm.port`
 * Purpose: LLM service abstraction for hexagonal architecture.
 * Scope: One non-streaming chat completion against a named model. Does not handle model fallback or rate limiting.
 * Invariants: Only depends on core domain types, no infrastructure concerns
 * Side-effects: none (interface only)
 * Notes: Implementations throw LlmError on any failure, including empty responses
 * Links: Implemented by adapters/server/ai, used by features/relay/services/completion-client
 * @public
 */

import type { Message } from "@/core";

export type { Message } from "@/core";

export interface CompletionParams {
  messages: Message[];
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LlmCompletionResult {
  message: Message;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  finishReason?: string;
  /** Model id reported by the provider (may differ from the requested alias) */
  resolvedModel?: string;
}

export interface LlmService {
  completion(params: CompletionParams): Promise<LlmCompletionResult>;
}
