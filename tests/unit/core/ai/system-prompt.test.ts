// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/ai/system-prompt`
 * Purpose: Unit tests for system prompt construction and completion message composition.
 * Scope: Pure functions only. Does not call any model.
 * Invariants: Exactly one system message, first; context verbatim; user message last.
 * Side-effects: none (unit tests only)
 * Links: Tests @/core/ai/system-prompt
 */

import { describe, expect, it } from "vitest";

import {
  buildSystemPrompt,
  composeCompletionMessages,
  type Message,
} from "@/core";

describe("buildSystemPrompt", () => {
  it("names Russian when the detected language is ru", () => {
    expect(buildSystemPrompt("ru")).toContain("(currently: Russian)");
  });

  it("falls back to the user's language otherwise", () => {
    expect(buildSystemPrompt("unspecified")).toContain(
      "(currently: the user's language)"
    );
  });

  it("lists the five safety rules in order", () => {
    const lines = buildSystemPrompt("unspecified").split("\n");
    const ruleNumbers = lines
      .filter((line) => /^\d\) /.test(line))
      .map((line) => line.slice(0, 2));
    expect(ruleNumbers).toEqual(["1)", "2)", "3)", "4)", "5)"]);
  });
});

describe("composeCompletionMessages", () => {
  it("sends only system and user messages for a fresh conversation", () => {
    const messages = composeCompletionMessages("Hello");

    expect(messages).toHaveLength(2);
    expect(messages[0]?.role).toBe("system");
    expect(messages[1]).toEqual({ role: "user", content: "Hello" });
  });

  it("places context verbatim between system prompt and new message", () => {
    const context: Message[] = [
      { role: "user", content: "earlier" },
      { role: "assistant", content: "reply" },
    ];

    const messages = composeCompletionMessages("now", context);

    expect(messages.map((m) => m.role)).toEqual([
      "system",
      "user",
      "assistant",
      "user",
    ]);
    expect(messages.slice(1, 3)).toEqual(context);
    expect(messages[3]).toEqual({ role: "user", content: "now" });
  });

  it("detects language from the new message only", () => {
    const messages = composeCompletionMessages("hello", [
      { role: "user", content: "привет" },
    ]);
    expect(messages[0]?.content).toContain("(currently: the user's language)");
  });
});
