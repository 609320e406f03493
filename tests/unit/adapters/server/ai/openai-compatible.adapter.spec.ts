// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/openai-compatible`
 * Purpose: Unit tests for the chat-completions adapter with mocked HTTP calls.
 * Scope: Request shape, defaults, response mapping and error classification. Does NOT call a real provider.
 * Invariants: No real HTTP calls; deterministic responses.
 * Side-effects: none (mocked fetch)
 * Links: src/adapters/server/ai/openai-compatible.adapter.ts, LlmService port
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

import { OpenAiCompatibleAdapter } from "@/adapters/server/ai/openai-compatible.adapter";
import { LlmError } from "@/core";
import { makeNoopLogger } from "@/shared/observability";

const jsonResponse = (body: unknown, init: ResponseInit = {}) =>
  new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });

describe("OpenAiCompatibleAdapter", () => {
  const mockFetch = vi.fn<typeof fetch>();
  let adapter: OpenAiCompatibleAdapter;

  const basicParams = {
    messages: [{ role: "user" as const, content: "Hello world" }],
    model: "gpt-3.5-turbo",
  };

  const successBody = {
    id: "chatcmpl-test-1",
    model: "gpt-3.5-turbo-0125",
    choices: [
      {
        message: { role: "assistant", content: "Hello! How can I help?" },
        finish_reason: "stop",
      },
    ],
    usage: { prompt_tokens: 10, completion_tokens: 8, total_tokens: 18 },
  };

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
    adapter = new OpenAiCompatibleAdapter(
      {
        baseUrl: "https://llm.test/v1/",
        apiKey: "test-openai-key",
        timeoutMs: 5000,
      },
      makeNoopLogger()
    );
  });

  it("posts to the chat completions endpoint with defaults", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(successBody));

    await adapter.completion(basicParams);

    expect(mockFetch).toHaveBeenCalledWith(
      "https://llm.test/v1/chat/completions",
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: "Bearer test-openai-key",
        },
        body: JSON.stringify({
          model: "gpt-3.5-turbo",
          messages: [{ role: "user", content: "Hello world" }],
          temperature: 0.7,
          max_tokens: 1000,
        }),
        signal: expect.any(AbortSignal),
      }
    );
  });

  it("uses per-call parameters over configured defaults", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(successBody));

    await adapter.completion({ ...basicParams, temperature: 0.2, maxTokens: 64 });

    const body = JSON.parse(String(mockFetch.mock.calls[0]?.[1]?.body));
    expect(body).toMatchObject({ temperature: 0.2, max_tokens: 64 });
  });

  it("maps a successful response", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(successBody));

    const result = await adapter.completion(basicParams);

    expect(result).toEqual({
      message: { role: "assistant", content: "Hello! How can I help?" },
      resolvedModel: "gpt-3.5-turbo-0125",
      usage: { promptTokens: 10, completionTokens: 8, totalTokens: 18 },
      finishReason: "stop",
    });
  });

  it("computes total tokens when the provider omits them", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        choices: [{ message: { content: "ok" } }],
        usage: { prompt_tokens: 3, completion_tokens: 4 },
      })
    );

    const result = await adapter.completion(basicParams);

    expect(result.resolvedModel).toBe("gpt-3.5-turbo");
    expect(result.usage?.totalTokens).toBe(7);
    expect(result.finishReason).toBeUndefined();
  });

  it("surfaces the provider error message and status", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(
        { error: { message: "Rate limit reached" } },
        { status: 429, statusText: "Too Many Requests" }
      )
    );

    const error = await adapter.completion(basicParams).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({
      message: "Error code: 429 - Rate limit reached",
      kind: "rate_limited",
      status: 429,
    });
  });

  it("falls back to the status text when the error body is not JSON", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response("bad gateway", { status: 502, statusText: "Bad Gateway" })
    );

    await expect(adapter.completion(basicParams)).rejects.toMatchObject({
      message: "Error code: 502 Bad Gateway",
      kind: "provider_5xx",
    });
  });

  it("reports timeouts", async () => {
    mockFetch.mockRejectedValueOnce(
      Object.assign(new Error("The operation was aborted"), {
        name: "TimeoutError",
      })
    );

    await expect(adapter.completion(basicParams)).rejects.toMatchObject({
      message: "Request timed out after 5000ms",
      kind: "timeout",
      status: 408,
    });
  });

  it("reports network failures", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(adapter.completion(basicParams)).rejects.toMatchObject({
      message: "Network error: fetch failed",
      kind: "unknown",
    });
  });

  it("rejects an empty completion", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ choices: [{ message: { content: "   " } }] })
    );

    await expect(adapter.completion(basicParams)).rejects.toMatchObject({
      message: "Empty response from model gpt-3.5-turbo",
      kind: "empty_response",
    });
  });

  it("rejects a malformed body", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: "nope" }));

    await expect(adapter.completion(basicParams)).rejects.toThrow(
      "Invalid response from completion API"
    );
  });
});
