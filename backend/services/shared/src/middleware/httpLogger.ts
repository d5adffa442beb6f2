// backend/services/shared/src/middleware/httpLogger.ts

/**
 * Why:
 * - Consistent, structured access logs across services so ops can aggregate
 *   by `service` and correlate by `reqId`.
 * - Telemetry only. It never blocks a request, and it is not the pipeline's
 *   requestLogging stage (that one records headers and bodies).
 *
 * Order:
 * - Mount first. `req.id` and `req.log` are set here; the pipeline uses
 *   `req.log` as its request-scoped logger.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health endpoints and favicons are not auto-logged.
 * - We *reuse* an inbound correlation id if present; only mint a UUID if missing.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { Logger } from "pino";
import { logger as rootLogger } from "../utils/logger";

const QUIET_PATHS = new Set([
  "/health",
  "/health/live",
  "/health/ready",
  "/healthz",
  "/readyz",
  "/favicon.ico",
]);

function firstHeader(req: IncomingMessage, name: string): string | undefined {
  const v = req.headers[name];
  return Array.isArray(v) ? v[0] : v;
}

export function requestIdOf(req: IncomingMessage): string {
  return (
    firstHeader(req, "x-request-id") ||
    firstHeader(req, "x-correlation-id") ||
    randomUUID()
  );
}

export function makeHttpLogger(serviceName: string, base?: Logger) {
  // Every entry carries `{ service: <slug> }`
  const logger = (base ?? rootLogger).child({ service: serviceName });

  return pinoHttp({
    logger,

    // Echo `x-request-id` so callers can correlate across hops.
    genReqId: (req, res) => {
      const id = requestIdOf(req);
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: String(req.id ?? ""),
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) =>
        QUIET_PATHS.has((req.url ?? "").split("?")[0] ?? ""),
    },

    // Keep serialized payloads lean; headers/bodies belong to requestLogging.
    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
