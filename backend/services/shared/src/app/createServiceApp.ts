// backend/services/shared/src/app/createServiceApp.ts

/**
 * Why:
 * - One builder assembles every service the same way:
 *   http logger → health (open) → raw body capture → routes (each behind the
 *   request pipeline) → pipeline fallthrough (404) → 4xx faults replayed
 *   through the pipeline → transport error tail.
 *
 * Notes:
 * - The body is captured as raw bytes. JSON binding happens inside route
 *   handlers, so malformed JSON is a pipeline fault (500), not a parser 400.
 * - Unmatched paths, undecodable route params and oversized bodies still run
 *   the pipeline, so a missing Authorization header answers 401 first.
 */

import express, { type Express, type RequestHandler } from "express";
import type { Logger } from "pino";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  clientFaultsThroughPipeline,
  errorProblemJson,
} from "../middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "../health";
import { pipelineRoutes } from "../http/expressAdapter";
import { notFound } from "../http/HttpResult";
import type { Pipeline, RouteHandler } from "../pipeline/Pipeline";

export type RouteBinder = (route: RouteHandler) => RequestHandler;

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "user"). Used in logs. */
  serviceName: string;
  /** Request pipeline every route runs behind. Sealed on first bind. */
  pipeline: Pipeline;
  /** Mounts the service's routes; `pipe` wraps a handler in the pipeline. */
  mountRoutes: (router: express.Router, pipe: RouteBinder) => void;
  /** Health readiness hook (optional). */
  readiness?: ReadinessFn;
  /** Root logger for the http logger (defaults to the shared logger). */
  logger?: Logger;
  /** Max request body size accepted by the raw parser (default "1mb"). */
  bodyLimit?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, pipeline, mountRoutes, readiness, logger } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Telemetry ───────────────────────────────────────────────────────────────
  app.use(makeHttpLogger(serviceName, logger));

  // ── Health (public, no auth) ────────────────────────────────────────────────
  app.use(createHealthRouter({ service: serviceName, readiness }));

  // ── Body capture (bytes; stages and handlers read it independently) ────────
  app.use(express.raw({ type: () => true, limit: opts.bodyLimit ?? "1mb" }));

  // ── Routes (one-liners, each behind the pipeline) ───────────────────────────
  const pipe = pipelineRoutes(pipeline);
  const router = express.Router();
  mountRoutes(router, pipe);
  app.use(router);

  // ── Tails: unmatched → pipeline 404; client faults → pipeline; rest → formatter
  app.use(pipe(() => notFound()));
  app.use(clientFaultsThroughPipeline(pipe));
  app.use(errorProblemJson());

  return app;
}
