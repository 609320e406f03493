// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type OpenAiCompatibleConfig,
  OpenAiCompatibleAdapter,
} from "./ai/openai-compatible.adapter";
export {
  createRedisClient,
  type UpstashCooldownConfig,
  UpstashCooldownStore,
} from "./cooldown/upstash-cooldown.adapter";
export {
  createHistoryDatabase,
  type HistoryDatabase,
  type HistoryDbConfig,
} from "./db/client";
export {
  type TelegramBotConfig,
  TelegramBotAdapter,
} from "./telegram/telegram-bot.adapter";
