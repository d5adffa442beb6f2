// backend/services/shared/src/middleware/authentication.ts
/**
 * Purpose:
 * - Static-token gate on the `Authorization` header.
 *
 * Modes:
 * - "legacy-inverted": the behavior the directory has always shipped with.
 *   A non-empty header EQUAL to the accepted token is rejected; any other
 *   value (including an empty one) passes. Kept for client compatibility.
 * - "strict": only a header equal to the accepted token passes.
 *
 * In both modes a missing header short-circuits with 401 and `next` is not called.
 */

import { unauthorized } from "../http/HttpResult";
import type { PipelineStage } from "../pipeline/Pipeline";

export const AUTHENTICATION_STAGE = "authentication";

export const AUTH_MODES = ["legacy-inverted", "strict"] as const;
export type AuthMode = (typeof AUTH_MODES)[number];

export const MISSING_TOKEN = "Authorization token is missing.";
export const INVALID_TOKEN = "Invalid or expired token.";

export type AuthenticationOptions = {
  /** The single accepted header value, e.g. "Bearer <token>". */
  acceptedToken: string;
  mode: AuthMode;
};

export type AuthError = { kind: "auth"; reason: "missing" | "invalid" };

/** Decide the outcome for a header value; `undefined` means the header is absent. */
export function checkToken(
  header: string | undefined,
  opts: AuthenticationOptions
): AuthError | null {
  if (header === undefined) return { kind: "auth", reason: "missing" };

  const matches = header === opts.acceptedToken;
  if (opts.mode === "strict") {
    return matches ? null : { kind: "auth", reason: "invalid" };
  }
  return header !== "" && matches ? { kind: "auth", reason: "invalid" } : null;
}

export function authentication(opts: AuthenticationOptions): PipelineStage {
  if (!opts.acceptedToken) {
    throw new Error("authentication: acceptedToken is required");
  }

  return {
    name: AUTHENTICATION_STAGE,
    handle: async (ctx, next) => {
      const denied = checkToken(ctx.header("authorization"), opts);
      if (!denied) return next();

      ctx.log.warn(
        { reqId: ctx.requestId, reason: denied.reason, mode: opts.mode },
        "auth: request rejected"
      );
      return unauthorized(
        denied.reason === "missing" ? MISSING_TOKEN : INVALID_TOKEN
      );
    },
  };
}
