// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/db-url`
 * Purpose: Database URL construction utility for PostgreSQL connections.
 * Scope: Single source of truth for DATABASE_URL construction from env pieces. Does not handle connections or validation.
 * Invariants: Pure function; no Zod deps; requires DB_USER, DB_NAME, DB_HOST; an empty DB_PASSWORD yields a passwordless URL.
 * Side-effects: none
 * Notes: Credentials are percent-encoded so passwords with reserved characters survive.
 * Links: Used by server env validation
 * @public
 */

export interface DbEnvInput {
  DB_USER?: string;
  DB_PASSWORD?: string;
  DB_NAME?: string;
  DB_HOST?: string;
  DB_PORT?: string | number;
}

export function buildDatabaseUrl(env: DbEnvInput): string {
  const user = env.DB_USER;
  const password = env.DB_PASSWORD;
  const db = env.DB_NAME;
  const host = env.DB_HOST;
  const port =
    typeof env.DB_PORT === "number"
      ? env.DB_PORT
      : Number(env.DB_PORT ?? "5432");

  if (!user || password === undefined || !db) {
    throw new TypeError(
      "Missing required DB env vars: DB_USER, DB_PASSWORD, DB_NAME"
    );
  }

  if (!host) {
    throw new TypeError("Missing required DB env var: DB_HOST");
  }

  if (!Number.isFinite(port)) {
    throw new TypeError(`Invalid DB_PORT value: ${env.DB_PORT}`);
  }

  const credentials = password
    ? `${encodeURIComponent(user)}:${encodeURIComponent(password)}`
    : encodeURIComponent(user);
  return `postgresql://${credentials}@${host}:${port}/${db}`;
}
