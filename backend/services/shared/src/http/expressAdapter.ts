// backend/services/shared/src/http/expressAdapter.ts
/**
 * Purpose:
 * - Bridge between Express (routing, params, transport) and the request
 *   pipeline. Routes stay one-liners:
 *     router.get("/users/:name", pipe(getUser(svc)));
 *
 * Notes:
 * - Expects `express.raw()` to have run, so `req.body` is a Buffer. Anything
 *   else (no body, or a parser that didn't match) is treated as empty.
 * - A rejection here means writing the response itself failed; it goes to
 *   Express' error tail via `next(err)`.
 */

import type { Request, RequestHandler, Response } from "express";
import type { Pipeline, RouteHandler } from "../pipeline/Pipeline";
import type { HttpResult } from "./HttpResult";
import { RequestBody } from "./RequestBody";
import { RequestContext } from "./RequestContext";

export function contextFromExpress(req: Request): RequestContext {
  const raw: unknown = req.body;
  return new RequestContext({
    method: req.method,
    path: (req.originalUrl || req.url).split("?")[0] ?? "/",
    headers: req.headers,
    params: { ...req.params },
    body: new RequestBody(Buffer.isBuffer(raw) ? raw : undefined),
    requestId: String(req.id ?? ""),
    log: req.log,
  });
}

export function writeResult(res: Response, result: HttpResult): void {
  for (const [name, value] of Object.entries(result.headers ?? {})) {
    res.setHeader(name, value);
  }
  res.status(result.status);
  if (result.body === undefined) {
    res.end();
    return;
  }
  res.json(result.body);
}

/** Returns a factory binding route handlers to this pipeline. */
export function pipelineRoutes(
  pipeline: Pipeline
): (route: RouteHandler) => RequestHandler {
  return (route) => {
    const run = pipeline.handler(route);
    return (req, res, next) => {
      Promise.resolve(run(contextFromExpress(req)))
        .then((result) => writeResult(res, result))
        .catch(next);
    };
  };
}
