// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/openai-compatible`
 * Purpose: LlmService implementation over an OpenAI-compatible `/chat/completions` endpoint.
 * Scope: Single non-streaming completion per call with timeout and typed errors. Does not handle fallback, prompts or rate-limiting.
 * Invariants: Never logs prompts/keys/content; per-request timeout from config; model required; empty or missing content throws LlmError(kind='empty_response').
 * Side-effects: IO (HTTP calls to the completion API)
 * Notes: Response body validated with zod at the boundary; provider error messages are surfaced in LlmError.message.
 * Links: LlmService port, bootstrap/container
 * @internal
 */

import { z } from "zod";

import { classifyLlmErrorFromStatus, LlmError } from "@/core";
import type {
  CompletionParams,
  LlmCompletionResult,
  LlmService,
} from "@/ports";
import type { Logger } from "@/shared/observability";

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1000;

export interface OpenAiCompatibleConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
}

const completionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

const errorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

/**
 * Pull the provider's own error text out of a failed response, if any.
 */
async function readProviderError(response: Response): Promise<string | null> {
  try {
    const parsed = errorBodySchema.safeParse(await response.json());
    return parsed.success ? parsed.data.error.message : null;
  } catch {
    return null;
  }
}

export class OpenAiCompatibleAdapter implements LlmService {
  private readonly endpoint: string;

  constructor(
    private readonly config: OpenAiCompatibleConfig,
    private readonly log: Logger
  ) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, "")}/chat/completions`;
  }

  async completion(params: CompletionParams): Promise<LlmCompletionResult> {
    if (!params.model) {
      throw new Error("Completion requires model parameter");
    }
    const model = params.model;

    const requestBody = {
      model,
      messages: params.messages.map((msg) => ({
        role: msg.role,
        content: msg.content,
      })),
      temperature:
        params.temperature ?? this.config.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens:
        params.maxTokens ?? this.config.maxTokens ?? DEFAULT_MAX_TOKENS,
    };

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify(requestBody),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === "AbortError" || error.name === "TimeoutError") {
          throw new LlmError(
            `Request timed out after ${this.config.timeoutMs}ms`,
            "timeout",
            408
          );
        }
        throw new LlmError(`Network error: ${error.message}`, "unknown");
      }
      throw new LlmError("Completion failed: Unknown error", "unknown");
    }

    if (!response.ok) {
      const kind = classifyLlmErrorFromStatus(response.status);
      const providerMessage = await readProviderError(response);
      throw new LlmError(
        providerMessage
          ? `Error code: ${response.status} - ${providerMessage}`
          : `Error code: ${response.status} ${response.statusText}`,
        kind,
        response.status
      );
    }

    const parsed = completionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new LlmError("Invalid response from completion API", "unknown");
    }
    const data = parsed.data;
    const choice = data.choices[0];
    const content = choice?.message.content;

    if (!content || content.trim().length === 0) {
      throw new LlmError(`Empty response from model ${model}`, "empty_response");
    }

    const result: LlmCompletionResult = {
      message: { role: "assistant", content },
      resolvedModel: data.model ?? model,
    };

    if (data.usage) {
      const promptTokens = data.usage.prompt_tokens;
      const completionTokens = data.usage.completion_tokens;
      result.usage = {
        promptTokens,
        completionTokens,
        totalTokens: data.usage.total_tokens ?? promptTokens + completionTokens,
      };
    }

    if (choice?.finish_reason) {
      result.finishReason = choice.finish_reason;
    }

    // Sanitized adapter log (no content, bounded fields only)
    this.log.info(
      {
        model: result.resolvedModel,
        tokensUsed: result.usage?.totalTokens,
        finishReason: result.finishReason,
        contentLength: content.length,
      },
      "adapter.openai.completion_result"
    );

    return result;
  }
}
