// backend/services/shared/src/http/RequestBody.ts
/**
 * Purpose:
 * - Request payload captured once as bytes so any stage can read it without
 *   consuming it for the next reader.
 *
 * Notes:
 * - `stream()` hands out a fresh Readable per call; draining one never
 *   advances another.
 * - `json()` throws on malformed input. Callers inside the pipeline let that
 *   propagate to the error boundary.
 */

import { Readable } from "node:stream";

export class RequestBody {
  readonly #bytes: Buffer;

  constructor(bytes: Buffer = Buffer.alloc(0)) {
    this.#bytes = Buffer.from(bytes);
  }

  static fromText(text: string): RequestBody {
    return new RequestBody(Buffer.from(text, "utf8"));
  }

  static fromJson(value: unknown): RequestBody {
    return RequestBody.fromText(JSON.stringify(value));
  }

  get length(): number {
    return this.#bytes.length;
  }

  isEmpty(): boolean {
    return this.#bytes.length === 0;
  }

  text(): string {
    return this.#bytes.toString("utf8");
  }

  json(): unknown {
    if (this.isEmpty()) throw new SyntaxError("Request body is empty");
    return JSON.parse(this.text());
  }

  /** Copy of the raw bytes. */
  bytes(): Buffer {
    return Buffer.from(this.#bytes);
  }

  stream(): Readable {
    return Readable.from([this.bytes()]);
  }
}
