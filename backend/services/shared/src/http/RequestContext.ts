// backend/services/shared/src/http/RequestContext.ts
/**
 * Purpose:
 * - Per-call bag handed BY REFERENCE through every pipeline stage and into
 *   the route handler. Built once by the Express adapter (or directly in tests).
 *
 * Notes:
 * - Header names are stored lower-cased; `header()` lookups are case-insensitive.
 * - `response` is filled in as the result travels back out of the pipeline,
 *   so outer stages can read what inner stages produced.
 */

import type { Logger } from "pino";
import type { HttpResult } from "./HttpResult";
import { RequestBody } from "./RequestBody";

export type HeaderValue = string | string[] | undefined;

export type RequestContextInit = {
  method: string;
  path: string;
  headers?: Record<string, HeaderValue>;
  params?: Record<string, string>;
  body?: RequestBody;
  requestId?: string;
  log: Logger;
};

export class RequestContext {
  public readonly method: string;
  public readonly path: string;
  public readonly headers: Readonly<Record<string, HeaderValue>>;
  public readonly params: Readonly<Record<string, string>>;
  public readonly body: RequestBody;
  public readonly requestId: string;
  public readonly log: Logger;
  public response?: HttpResult;

  constructor(init: RequestContextInit) {
    this.method = init.method.toUpperCase();
    this.path = init.path;
    this.headers = lowerCaseKeys(init.headers ?? {});
    this.params = { ...(init.params ?? {}) };
    this.body = init.body ?? new RequestBody();
    this.requestId = init.requestId ?? "";
    this.log = init.log;
  }

  /** Single header value; repeated headers are joined with ", ". */
  public header(name: string): string | undefined {
    const v = this.headers[name.toLowerCase()];
    if (v === undefined) return undefined;
    return Array.isArray(v) ? v.join(", ") : v;
  }

  public hasHeader(name: string): boolean {
    return this.headers[name.toLowerCase()] !== undefined;
  }

  /** Route param by name; route handlers only run when the router bound it. */
  public param(name: string): string {
    const v = this.params[name];
    if (v === undefined) throw new Error(`Missing route param: ${name}`);
    return v;
  }
}

function lowerCaseKeys(
  headers: Record<string, HeaderValue>
): Record<string, HeaderValue> {
  const out: Record<string, HeaderValue> = {};
  for (const [k, v] of Object.entries(headers)) out[k.toLowerCase()] = v;
  return out;
}
