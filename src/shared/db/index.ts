// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db`
 * Purpose: Barrel export for database schemas and URL construction utilities.
 * Scope: Exposes both dialect schemas under namespaces (same table name in each). Does not handle connections or migrations.
 * Invariants: Only re-exports public APIs; maintains type safety.
 * Side-effects: none
 * Links: Used by adapters for database operations
 * @public
 */

export * from "./db-url";
export * as pgSchema from "./schema.pg";
export * as sqliteSchema from "./schema.sqlite";
