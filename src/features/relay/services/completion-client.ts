// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/relay/services/completion-client`
 * Purpose: Produce one reply from the completion API with ordered primary/fallback model attempts.
 * Scope: Prompt composition, attempt loop, sticky model promotion. Does not retry a model or persist anything.
 * Invariants:
 *   - Attempt order is [primary, fallback], fallback omitted when equal to primary
 *   - The model that succeeds becomes the primary for later calls in this process
 *   - Returned text is trimmed and non-empty
 *   - Total failure throws CompletionError with the last attempt's error as cause
 * Side-effects: IO (via LlmService port)
 * Links: core/ai/system-prompt, ports/llm.port
 * @public
 */

import {
  CompletionError,
  composeCompletionMessages,
  LlmError,
  type Message,
} from "@/core";
import type { LlmService } from "@/ports";
import type { Logger } from "@/shared/observability";

export interface CompletionClientOptions {
  primaryModel: string;
  fallbackModel: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ReplyGenerator {
  generate(userText: string, context?: readonly Message[]): Promise<string>;
}

export class CompletionClient implements ReplyGenerator {
  private primaryModel: string;
  private readonly fallbackModel: string;

  constructor(
    private readonly llm: LlmService,
    private readonly options: CompletionClientOptions,
    private readonly log: Logger
  ) {
    this.primaryModel = options.primaryModel;
    this.fallbackModel = options.fallbackModel;
  }

  get currentPrimary(): string {
    return this.primaryModel;
  }

  attemptOrder(): string[] {
    return this.primaryModel === this.fallbackModel
      ? [this.primaryModel]
      : [this.primaryModel, this.fallbackModel];
  }

  async generate(
    userText: string,
    context: readonly Message[] = []
  ): Promise<string> {
    const messages = composeCompletionMessages(userText, context);
    const attempted: string[] = [];
    let lastError: unknown = new LlmError("No model configured", "unknown");

    for (const model of this.attemptOrder()) {
      attempted.push(model);
      try {
        const result = await this.llm.completion({
          messages,
          model,
          temperature: this.options.temperature,
          maxTokens: this.options.maxTokens,
        });
        const text = result.message.content.trim();
        if (text.length === 0) {
          throw new LlmError(
            `Empty response from model ${model}`,
            "empty_response"
          );
        }

        if (model !== this.primaryModel) {
          this.log.warn(
            { from: this.primaryModel, to: model },
            "relay.completion.primary_switched"
          );
          this.primaryModel = model;
        }
        return text;
      } catch (error) {
        lastError = error;
        this.log.warn(
          {
            model,
            kind: error instanceof LlmError ? error.kind : "unknown",
          },
          "relay.completion.attempt_failed"
        );
      }
    }

    throw new CompletionError(attempted, lastError);
  }
}
