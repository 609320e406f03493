// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Process environment validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the relay process; provides lazy cached access and a pure parser for tests. Does not read .env files.
 * Invariants: All required env vars validated on first access; fails fast on invalid env; DATABASE_URL resolved only for PostgreSQL.
 * Side-effects: process.env
 * Notes: DB_TYPE aliases collapse to "postgresql" | "sqlite". FREE_VERSION_GPT accepts 1/true/yes/y (case-insensitive).
 *        MAX_CONTEXT_MESSAGES outside 0..20 is a configuration error, not clamped.
 *        REDIS_URL must be the http(s) REST endpoint the Upstash client speaks; redis:// DSNs are rejected.
 * Links: shared/db/db-url, bootstrap/container
 * @public
 */

import { ZodError, z } from "zod";

import { buildDatabaseUrl } from "@/shared/db/db-url";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

export function isEnvValidationError(
  error: unknown
): error is EnvValidationError {
  return error instanceof EnvValidationError;
}

const TRUTHY_FLAGS = new Set(["1", "true", "yes", "y"]);

const flag = z
  .string()
  .optional()
  .transform(
    (value) =>
      value !== undefined && TRUTHY_FLAGS.has(value.trim().toLowerCase())
  );

const dbType = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
  z
    .enum(["postgres", "postgresql", "sqlite", "sqlite3"])
    .default("postgresql")
    .transform((value) =>
      value === "sqlite" || value === "sqlite3" ? "sqlite" : "postgresql"
    )
);

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  SERVICE_NAME: z.string().default("chat-relay"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // Chat transport
  BOT_TOKEN: z
    .string()
    .min(1)
    .refine((value) => value.includes(":"), {
      message: "BOT_TOKEN must look like <id>:<secret>",
    }),
  TELEGRAM_API_BASE_URL: z.string().url().default("https://api.telegram.org"),
  POLL_TIMEOUT_SECONDS: z.coerce.number().int().min(0).max(50).default(30),

  // Completion API
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_FALLBACK_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1000)
    .max(120_000)
    .default(30_000),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(1000),

  // Free-tier gate
  FREE_VERSION_GPT: flag,
  COOLDOWN_SECONDS: z.coerce.number().int().positive().default(180),
  REDIS_URL: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), {
      message: "REDIS_URL must be an http(s) REST endpoint",
    })
    .default("http://localhost:8079"),
  REDIS_TOKEN: z.string().min(1).default("local-dev-token"),

  // History store
  DB_TYPE: dbType,
  DATABASE_URL: z.string().min(1).optional(),
  DB_HOST: z.string().min(1).default("localhost"),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().min(1).default("telegram_bot"),
  DB_USER: z.string().min(1).default("postgres"),
  DB_PASSWORD: z.string().default("postgres"),
  SQLITE_PATH: z.string().min(1).default("db.sqlite3"),

  // Conversation behaviour
  MAX_CONTEXT_MESSAGES: z.coerce.number().int().min(0).max(20).default(5),
  SERIALIZE_USER_TURNS: flag,
});

type ParsedEnv = z.infer<typeof serverSchema>;

type ServerEnv = Omit<ParsedEnv, "DB_TYPE" | "DATABASE_URL"> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
} & (
    | { DB_TYPE: "postgresql"; DATABASE_URL: string }
    | { DB_TYPE: "sqlite"; DATABASE_URL: undefined }
  );

function toValidationError(error: ZodError): EnvValidationError {
  const missing = new Set<string>();
  const invalid = new Set<string>();

  for (const issue of error.issues) {
    const key = issue.path[0]?.toString();
    if (!key) continue;

    /*
     * Treat all invalid_type as missing (avoids any casting)
     */
    if (issue.code === "invalid_type") {
      missing.add(key);
    } else {
      invalid.add(key);
    }
  }

  return new EnvValidationError({
    code: "INVALID_ENV",
    missing: [...missing],
    invalid: [...invalid],
  });
}

/**
 * Pure parser. Tests pass their own source; runtime goes through serverEnv().
 */
export function parseEnv(
  source: Record<string, string | undefined>
): ServerEnv {
  let parsed: ParsedEnv;
  try {
    parsed = serverSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      throw toValidationError(error);
    }
    throw error;
  }

  const { DB_TYPE, DATABASE_URL, ...rest } = parsed;
  const derived = {
    isDev: parsed.NODE_ENV === "development",
    isTest: parsed.NODE_ENV === "test",
    isProd: parsed.NODE_ENV === "production",
  };

  if (DB_TYPE === "sqlite") {
    return { ...rest, ...derived, DB_TYPE, DATABASE_URL: undefined };
  }

  // Direct DATABASE_URL wins; otherwise build from component pieces
  return {
    ...rest,
    ...derived,
    DB_TYPE,
    DATABASE_URL:
      DATABASE_URL ??
      buildDatabaseUrl({
        DB_USER: parsed.DB_USER,
        DB_PASSWORD: parsed.DB_PASSWORD,
        DB_NAME: parsed.DB_NAME,
        DB_HOST: parsed.DB_HOST,
        DB_PORT: parsed.DB_PORT,
      }),
  };
}

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    ENV = parseEnv(process.env);
  }
  return ENV;
}

/**
 * Validate once at startup; throws EnvValidationError on failure.
 */
export function ensureServerEnv(): void {
  serverEnv();
}

export type { ServerEnv };
