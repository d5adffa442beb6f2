// backend/services/user/src/config.ts

/**
 * SOP-compliant config:
 * - No dotenv loading here (bootstrap.ts loads env).
 * - No hardcoded defaults; all required vars must be present.
 * - Fail fast at import time if something is missing/invalid.
 */

import {
  requireBoolean,
  requireEnum,
  requireEnv,
  requireNumber,
} from "@userdir/shared/src/env";
import { AUTH_MODES } from "@userdir/shared/src/middleware/authentication";

export const config = {
  // pass-through (optional)
  env: process.env.NODE_ENV,

  // required
  port: requireNumber("USER_PORT"),
  logLevel: requireEnv("LOG_LEVEL"),
  authToken: requireEnv("USER_AUTH_TOKEN"),
  authMode: requireEnum("USER_AUTH_MODE", AUTH_MODES),
  seedOnBoot: requireBoolean("USER_SEED_ON_BOOT"),
  bodyLimit: requireEnv("USER_BODY_LIMIT"),
} as const;
