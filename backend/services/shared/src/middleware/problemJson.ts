// backend/services/shared/src/middleware/problemJson.ts
/**
 * Purpose:
 * - Express error tails for faults raised OUTSIDE the request pipeline.
 *   4xx faults are replayed through the pipeline; whatever is left (a
 *   response that failed to write, a 5xx from a parser) is formatted here.
 *   Faults inside the pipeline are already answered by the errorHandling stage.
 *
 * Notes:
 * - Honors an HTTP status carried by the error (body-parser sets `status`,
 *   e.g. 413 for an oversized payload); anything else is a 500.
 * - Same body shape as the pipeline's fault boundary: `{ error, details }`.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import { faultMessage } from "./errorHandling";
import { clientError, type ErrorBody } from "../http/HttpResult";
import type { RouteHandler } from "../pipeline/Pipeline";

export function statusOf(err: unknown): number {
  if (typeof err !== "object" || err === null) return 500;
  const raw =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 400 && n < 600 ? n : 500;
}

/**
 * Client faults raised before a route handler runs (a route param that fails
 * to decode, an oversized body) still go through the pipeline, so
 * authentication answers first. 5xx faults fall through to errorProblemJson.
 */
export const clientFaultsThroughPipeline = (
  pipe: (route: RouteHandler) => RequestHandler
): ErrorRequestHandler => {
  return (err, req, res, next) => {
    const status = statusOf(err);
    if (status >= 500 || res.headersSent) {
      next(err);
      return;
    }
    const details = faultMessage(err);
    pipe(() => clientError(status, details))(req, res, next);
  };
};

export const errorProblemJson = (): ErrorRequestHandler => {
  return (err, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = statusOf(err);
    const details = faultMessage(err);
    req.log?.error({ status, err: { msg: details } }, "transport fault");

    const body: ErrorBody = {
      error: status >= 500 ? "Internal server error." : "Bad request.",
      details,
    };
    res.status(status).json(body);
  };
};
