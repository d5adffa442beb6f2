// backend/services/shared/src/middleware/errorHandling.ts
/**
 * Purpose:
 * - Outermost pipeline stage (fault boundary). Anything thrown or rejected by
 *   inner stages or the route handler becomes a 500 `{ error, details }`.
 *
 * Notes:
 * - Expected failures (validation, not-found, conflict, auth) never reach
 *   here as faults; they are ordinary results and pass through untouched.
 * - Never rethrows.
 */

import { internalError } from "../http/HttpResult";
import type { PipelineStage } from "../pipeline/Pipeline";

export const ERROR_HANDLING_STAGE = "errorHandling";

export function faultMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

export function errorHandling(): PipelineStage {
  return {
    name: ERROR_HANDLING_STAGE,
    handle: async (ctx, next) => {
      try {
        return await next();
      } catch (err) {
        const details = faultMessage(err);
        ctx.log.error(
          {
            reqId: ctx.requestId,
            method: ctx.method,
            path: ctx.path,
            err: {
              type: err instanceof Error ? err.name : typeof err,
              msg: details,
              stack: err instanceof Error ? err.stack : undefined,
            },
          },
          "unhandled exception"
        );
        return internalError(details);
      }
    },
  };
}
