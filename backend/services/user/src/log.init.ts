// backend/services/user/src/log.init.ts
import { initLogger } from "@userdir/shared/src/utils/logger";
import { SERVICE_NAME } from "./bootstrap";

/**
 * Side-effect module: initializes the shared logger with this service's name.
 * Import this ONCE, right after ./bootstrap, in index.ts.
 */
initLogger(SERVICE_NAME);
