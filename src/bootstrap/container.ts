// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Composition root wiring adapters to ports and relay services.
 * Scope: Build every adapter once from validated env and hand the handles down. Does not start polling or install signal handlers.
 * Invariants: One container per process (built by main); no module-level client singletons; free-tier gate wired only when active.
 * Side-effects: IO (opens the database connection; emits startup log)
 * Notes: ContainerOverrides lets tests swap transport, LLM, cooldown store or database for in-process fakes.
 * Links: src/main.ts, shared/env
 * @public
 */

import {
  createHistoryDatabase,
  createRedisClient,
  type HistoryDatabase,
  OpenAiCompatibleAdapter,
  TelegramBotAdapter,
  UpstashCooldownStore,
} from "@/adapters/server";
import {
  CompletionClient,
  ConversationCoordinator,
  createConcurrentTurns,
  createSerialTurnQueue,
  createUpdateHandler,
  isFreeTierGateActive,
  RateLimiter,
  runUpdateLoop,
  type UpdateHandler,
} from "@/features/relay/public";
import type { ChatTransport, CooldownStore, LlmService } from "@/ports";
import type { ServerEnv } from "@/shared/env";
import { type Logger, makeLogger } from "@/shared/observability";

export interface ContainerOverrides {
  log?: Logger;
  transport?: ChatTransport;
  llmService?: LlmService;
  cooldownStore?: CooldownStore;
  database?: HistoryDatabase;
}

export interface Container {
  log: Logger;
  database: HistoryDatabase;
  transport: ChatTransport;
  coordinator: ConversationCoordinator;
  handleUpdate: UpdateHandler;
  gateActive: boolean;
  /** Poll until `signal` aborts, then drain in-flight updates. */
  run(signal: AbortSignal): Promise<void>;
  close(): Promise<void>;
}

export function createContainer(
  env: ServerEnv,
  overrides: ContainerOverrides = {}
): Container {
  const log = overrides.log ?? makeLogger({ service: env.SERVICE_NAME });

  const database =
    overrides.database ??
    createHistoryDatabase(
      env.DB_TYPE === "sqlite"
        ? { kind: "sqlite", path: env.SQLITE_PATH }
        : { kind: "postgresql", url: env.DATABASE_URL }
    );

  const llmService =
    overrides.llmService ??
    new OpenAiCompatibleAdapter(
      {
        baseUrl: env.OPENAI_BASE_URL,
        apiKey: env.OPENAI_API_KEY,
        timeoutMs: env.OPENAI_TIMEOUT_MS,
        temperature: env.OPENAI_TEMPERATURE,
        maxTokens: env.OPENAI_MAX_TOKENS,
      },
      log.child({ component: "OpenAiCompatibleAdapter" })
    );

  const transport =
    overrides.transport ??
    new TelegramBotAdapter(
      {
        token: env.BOT_TOKEN,
        apiBaseUrl: env.TELEGRAM_API_BASE_URL,
        pollTimeoutSeconds: env.POLL_TIMEOUT_SECONDS,
      },
      log.child({ component: "TelegramBotAdapter" })
    );

  const gateActive = isFreeTierGateActive(
    env.FREE_VERSION_GPT,
    env.OPENAI_MODEL
  );
  const limiter = gateActive
    ? new RateLimiter(
        overrides.cooldownStore ??
          new UpstashCooldownStore(
            createRedisClient({ url: env.REDIS_URL, token: env.REDIS_TOKEN })
          ),
        { ttlSeconds: env.COOLDOWN_SECONDS }
      )
    : null;

  const completion = new CompletionClient(
    llmService,
    {
      primaryModel: env.OPENAI_MODEL,
      fallbackModel: env.OPENAI_FALLBACK_MODEL,
      temperature: env.OPENAI_TEMPERATURE,
      maxTokens: env.OPENAI_MAX_TOKENS,
    },
    log.child({ component: "CompletionClient" })
  );

  const coordinator = new ConversationCoordinator({
    history: database.store,
    completion,
    limiter,
    contextBound: env.MAX_CONTEXT_MESSAGES,
    log: log.child({ component: "ConversationCoordinator" }),
  });

  const handleUpdate = createUpdateHandler({
    coordinator,
    transport,
    turns: env.SERIALIZE_USER_TURNS
      ? createSerialTurnQueue()
      : createConcurrentTurns(),
    contextBound: env.MAX_CONTEXT_MESSAGES,
    cooldownSeconds: env.COOLDOWN_SECONDS,
    log: log.child({ component: "RelayHandlers" }),
  });

  // Startup log - no URLs/secrets
  log.info(
    {
      dbType: database.kind,
      model: env.OPENAI_MODEL,
      fallbackModel: env.OPENAI_FALLBACK_MODEL,
      gateActive,
      contextBound: env.MAX_CONTEXT_MESSAGES,
      serializeUserTurns: env.SERIALIZE_USER_TURNS,
      logLevel: env.PINO_LOG_LEVEL,
    },
    "container initialized"
  );

  return {
    log,
    database,
    transport,
    coordinator,
    handleUpdate,
    gateActive,
    run: (signal) =>
      runUpdateLoop(
        {
          transport,
          handle: handleUpdate,
          log: log.child({ component: "UpdateLoop" }),
        },
        signal
      ),
    close: () => database.close(),
  };
}
