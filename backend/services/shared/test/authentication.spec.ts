// backend/services/shared/test/authentication.spec.ts
import { describe, it, expect } from "vitest";
import { Pipeline } from "../src/pipeline/Pipeline";
import {
  authentication,
  checkToken,
  INVALID_TOKEN,
  MISSING_TOKEN,
  type AuthenticationOptions,
} from "../src/middleware/authentication";
import { noContent } from "../src/http/HttpResult";
import { captureLogger, makeCtx } from "./helpers/context";

const TOKEN = "Bearer test-secret";
const legacy: AuthenticationOptions = { acceptedToken: TOKEN, mode: "legacy-inverted" };
const strict: AuthenticationOptions = { acceptedToken: TOKEN, mode: "strict" };

function gated(opts: AuthenticationOptions) {
  let reached = 0;
  const run = new Pipeline("t").use(authentication(opts)).handler(() => {
    reached += 1;
    return noContent();
  });
  return { run, reached: () => reached };
}

describe("checkToken", () => {
  it("legacy-inverted rejects only the exact accepted token", () => {
    expect(checkToken(TOKEN, legacy)).toEqual({ kind: "auth", reason: "invalid" });
    expect(checkToken("Bearer other", legacy)).toBeNull();
    expect(checkToken("", legacy)).toBeNull();
    expect(checkToken(undefined, legacy)).toEqual({ kind: "auth", reason: "missing" });
  });

  it("strict accepts only the exact accepted token", () => {
    expect(checkToken(TOKEN, strict)).toBeNull();
    expect(checkToken("Bearer other", strict)).toEqual({ kind: "auth", reason: "invalid" });
    expect(checkToken("", strict)).toEqual({ kind: "auth", reason: "invalid" });
    expect(checkToken(undefined, strict)).toEqual({ kind: "auth", reason: "missing" });
  });
});

describe("authentication stage", () => {
  it("401 when the header is missing; route never runs", async () => {
    const cap = captureLogger();
    const g = gated(legacy);

    const res = await g.run(makeCtx({ log: cap.log }));

    expect(res).toEqual({ status: 401, body: { error: MISSING_TOKEN } });
    expect(g.reached()).toBe(0);
    expect(cap.find("auth: request rejected")?.reason).toBe("missing");
  });

  it("legacy-inverted: accepted token → 401 invalid", async () => {
    const g = gated(legacy);
    const res = await g.run(makeCtx({ headers: { Authorization: TOKEN } }));
    expect(res).toEqual({ status: 401, body: { error: INVALID_TOKEN } });
    expect(g.reached()).toBe(0);
  });

  it("legacy-inverted: any other value (empty included) passes", async () => {
    const g = gated(legacy);
    expect((await g.run(makeCtx({ headers: { authorization: "x" } }))).status).toBe(204);
    expect((await g.run(makeCtx({ headers: { authorization: "" } }))).status).toBe(204);
    expect(g.reached()).toBe(2);
  });

  it("strict: accepted token passes, anything else is 401", async () => {
    const g = gated(strict);
    expect((await g.run(makeCtx({ headers: { authorization: TOKEN } }))).status).toBe(204);
    const res = await g.run(makeCtx({ headers: { authorization: "Bearer nope" } }));
    expect(res).toEqual({ status: 401, body: { error: INVALID_TOKEN } });
    expect(g.reached()).toBe(1);
  });

  it("needs an accepted token to be configured", () => {
    expect(() => authentication({ acceptedToken: "", mode: "strict" })).toThrow(
      "authentication: acceptedToken is required"
    );
  });
});
