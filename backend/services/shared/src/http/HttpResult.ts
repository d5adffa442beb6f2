// backend/services/shared/src/http/HttpResult.ts
/**
 * Purpose:
 * - The value every pipeline stage and route handler returns. The Express
 *   adapter is the only place that turns it into bytes on the wire.
 *
 * Notes:
 * - `body === undefined` means an empty response body (no JSON written).
 */

export type HttpHeaders = Readonly<Record<string, string>>;

export type HttpResult = {
  status: number;
  headers?: HttpHeaders;
  body?: unknown;
};

/** Error bodies: `{ error }` for client faults, `{ error, details }` for 5xx. */
export type ErrorBody = { error: string; details?: string };

export const ok = (body: unknown): HttpResult => ({ status: 200, body });

export const created = (location: string, body: unknown): HttpResult => ({
  status: 201,
  headers: { Location: location },
  body,
});

export const noContent = (): HttpResult => ({ status: 204 });

export const notFound = (): HttpResult => ({ status: 404 });

export const badRequest = (error: string): HttpResult => ({
  status: 400,
  body: { error } satisfies ErrorBody,
});

/** 4xx raised by transport or routing, answered from inside the pipeline. */
export const clientError = (status: number, details: string): HttpResult => ({
  status,
  body: { error: "Bad request.", details } satisfies ErrorBody,
});

export const unauthorized = (error: string): HttpResult => ({
  status: 401,
  body: { error } satisfies ErrorBody,
});

export const internalError = (details: string): HttpResult => ({
  status: 500,
  body: { error: "Internal server error.", details } satisfies ErrorBody,
});
