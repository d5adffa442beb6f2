// backend/services/user/index.ts
/**
 * Why:
 * - Keep start-up boring and reliable: load env (bootstrap), init logs,
 *   seed the directory, then start HTTP with shared startHttpService.
 */

import { SERVICE_NAME, LOADED_ENV_FILES } from "./src/bootstrap"; // loads env
import "./src/log.init";

import { logger } from "@userdir/shared/src/utils/logger";
import { redactEnv } from "@userdir/shared/src/env";
import { startHttpService } from "@userdir/shared/src/bootstrap/startHttpService";
import { config } from "./src/config";
import { createUserApp, UserStore } from "./src/app";
import { SEED_USERS } from "./src/seed";

// Top-level guards
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start(): Promise<void> {
  logger.info(
    {
      files: LOADED_ENV_FILES,
      config: { ...config, ...redactEnv({ authToken: config.authToken }) },
    },
    "env loaded"
  );

  const store = new UserStore();
  if (config.seedOnBoot) {
    const added = store.seed(SEED_USERS);
    logger.info({ added }, "directory seeded");
  }

  const app = createUserApp({
    serviceName: SERVICE_NAME,
    store,
    auth: { acceptedToken: config.authToken, mode: config.authMode },
    logger,
    bodyLimit: config.bodyLimit,
  });

  const { listening } = startHttpService({
    app,
    port: config.port,
    serviceName: SERVICE_NAME,
    logger,
  });
  await listening;
}

start().catch((err: unknown) => {
  logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
