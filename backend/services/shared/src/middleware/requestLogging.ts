// backend/services/shared/src/middleware/requestLogging.ts
/**
 * Purpose:
 * - Innermost pipeline stage: one line for the inbound request (method, path,
 *   headers, body when present) and one for the outbound result (status, body).
 *
 * Notes:
 * - Observe-only. The inner result is returned as the same object.
 * - The body is read through RequestBody, which never consumes it, so the
 *   route handler still sees the full payload.
 * - Authorization/cookie values are scrubbed by the logger's redact paths.
 */

import type { PipelineStage } from "../pipeline/Pipeline";

export const REQUEST_LOGGING_STAGE = "requestLogging";

export function requestLogging(): PipelineStage {
  return {
    name: REQUEST_LOGGING_STAGE,
    handle: async (ctx, next) => {
      ctx.log.info(
        {
          reqId: ctx.requestId,
          method: ctx.method,
          path: ctx.path,
          headers: ctx.headers,
          ...(ctx.body.isEmpty() ? {} : { body: ctx.body.text() }),
        },
        "incoming request"
      );

      const result = await next();

      ctx.log.info(
        {
          reqId: ctx.requestId,
          statusCode: result.status,
          ...(result.body === undefined ? {} : { body: result.body }),
        },
        "outgoing response"
      );
      return result;
    },
  };
}
