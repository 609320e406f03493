// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * @internal
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  // Relay-specific secrets
  "BOT_TOKEN",
  "OPENAI_API_KEY",
  "REDIS_TOKEN",
  "DB_PASSWORD",
  "DATABASE_URL",
  "config.botToken",
  "config.openaiApiKey",
  // HTTP headers
  "headers.authorization",
  "req.headers.authorization",
  // Conversation content never reaches logs
  "text",
  "requestText",
  "responseText",
  "messages",
];
