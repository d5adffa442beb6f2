// backend/services/user/src/bootstrap.ts
/**
 * Why:
 * - Load envs via the shared cascade (repo → family → service) and assert
 *   the minimum required variables before anything reads them.
 */

import { loadEnvCascadeForService, assertEnv } from "@userdir/shared/src/env";

export const SERVICE_NAME = "user" as const;

// 1) Shared env cascade (later wins; injected env wins over files)
export const LOADED_ENV_FILES = loadEnvCascadeForService(__dirname);

// 2) Fail fast on required envs
assertEnv([
  "LOG_LEVEL",
  "USER_PORT",
  "USER_AUTH_TOKEN",
  "USER_AUTH_MODE",
  "USER_SEED_ON_BOOT",
  "USER_BODY_LIMIT",
]);
