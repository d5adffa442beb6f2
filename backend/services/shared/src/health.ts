// backend/services/shared/src/health.ts

/**
 * Why:
 * - Liveness and readiness must be predictable across services and **public**.
 * - Liveness answers "is the process up?" (cheap, no dependencies).
 * - Readiness answers "can this instance take traffic?" (fast, bounded checks).
 * - Every response carries a `requestId` so failures correlate with logs.
 *
 * Notes:
 * - Mounted before the request pipeline: no Authorization header needed.
 */

import express from "express";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  version?: string;
  /** Optional, fast readiness checker. Keep bounded and dependency-aware. */
  readiness?: ReadinessFn;
};

function getReqId(req: express.Request): string | undefined {
  return req.id === undefined ? undefined : String(req.id);
}

/**
 * Exposes:
 *   GET /health         -> legacy/compat liveness
 *   GET /health/live    -> explicit liveness
 *   GET /health/ready   -> explicit readiness
 *   GET /healthz        -> k8s-style liveness
 *   GET /readyz         -> k8s-style readiness
 */
export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
    version: opts.version,
  };

  const liveness = (req: express.Request, res: express.Response) => {
    res.json({ ...base, ok: true, requestId: getReqId(req) });
  };

  const readiness = (req: express.Request, res: express.Response) => {
    Promise.resolve()
      .then(() => (opts.readiness ? opts.readiness() : {}))
      .then((details) => {
        res.json({ ...base, ok: true, requestId: getReqId(req), ...details });
      })
      .catch((err: unknown) => {
        // 503 signals "not ready" to orchestrators; include safe error text.
        res.status(503).json({
          ...base,
          ok: false,
          requestId: getReqId(req),
          error: err instanceof Error ? err.message : String(err),
        });
      });
  };

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/healthz", liveness);
  router.get("/health/ready", readiness);
  router.get("/readyz", readiness);

  return router;
}
