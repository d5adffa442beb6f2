// backend/services/shared/src/utils/logger.ts
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  type DestinationStream,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap BEFORE
 * creating any request loggers (pino-http binds a child of `logger`).
 *
 * Usage:
 *   import { initLogger } from "@userdir/shared/src/utils/logger";
 *   initLogger("user");
 */

const VALID_LEVELS = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return VALID_LEVELS.has(v);
}

/** LOG_LEVEL is required everywhere; an unknown level fails the import. */
function levelFromEnv(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  if (!raw) throw new Error("Missing required env var: LOG_LEVEL");
  if (!isLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

/** Header paths scrubbed wherever they appear in a log line. */
export const REDACT_PATHS = [
  "headers.authorization",
  "headers.cookie",
  "req.headers.authorization",
  "req.headers.cookie",
];

export function buildLoggerOptions(
  level: LevelWithSilent,
  serviceName?: string
): LoggerOptions {
  return {
    level,
    // Avoid stamping "service":"unknown"; no base.service until initLogger().
    base: serviceName ? { service: serviceName } : {},
    timestamp: stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
  };
}

export let logger: Logger = pino(buildLoggerOptions(levelFromEnv()));

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): void {
  const name = serviceName.trim();
  if (!name) throw new Error("initLogger requires serviceName");
  logger = pino(buildLoggerOptions(levelFromEnv(), name));
}

/**
 * Standalone logger writing to an arbitrary destination. Tests use it to
 * capture lines; the shape matches the shared logger.
 */
export function createLogger(
  destination: DestinationStream,
  opts: { level?: LevelWithSilent; serviceName?: string } = {}
): Logger {
  return pino(
    buildLoggerOptions(opts.level ?? "info", opts.serviceName),
    destination
  );
}
