// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@main`
 * Purpose: Process entry point for the chat relay.
 * Scope: Wiring only - validate env, build the container, ensure storage, poll until a shutdown signal. Does not contain relay logic.
 * Invariants: Invalid configuration or storage init failure exits with code 1; SIGTERM/SIGINT stop polling, drain in-flight updates, then close the database.
 * Side-effects: IO (network, database, process signals, process exit code)
 * Links: bootstrap/container
 * @internal
 */

import { createContainer } from "@/bootstrap/container";
import { isEnvValidationError, serverEnv } from "@/shared/env";
import { flushLogger, makeLogger } from "@/shared/observability";

const logger = makeLogger({ component: "main" });

async function main(): Promise<void> {
  const env = serverEnv();
  const container = createContainer(env);

  try {
    await container.database.ensureSchema();
  } catch (error) {
    await container.close();
    throw error;
  }
  container.log.info({ dbType: container.database.kind }, "storage ready");

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.info({ signal }, "Received shutdown signal");
    controller.abort();
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  logger.info({}, "Relay polling started");
  try {
    await container.run(controller.signal);
  } finally {
    await container.close();
    logger.info({}, "Relay stopped");
  }
}

main().catch((error: unknown) => {
  if (isEnvValidationError(error)) {
    logger.fatal({ meta: error.meta }, "Invalid configuration");
  } else {
    logger.fatal({ err: error }, "Relay failed");
  }
  flushLogger(logger);
  process.exit(1);
});
