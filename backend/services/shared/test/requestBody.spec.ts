// backend/services/shared/test/requestBody.spec.ts
import { describe, it, expect } from "vitest";
import { RequestBody } from "../src/http/RequestBody";
import { makeCtx } from "./helpers/context";

async function drain(body: RequestBody): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of body.stream()) chunks.push(Buffer.from(chunk));
  return Buffer.concat(chunks).toString("utf8");
}

describe("RequestBody", () => {
  it("can be read any number of times", async () => {
    const body = RequestBody.fromJson({ UserName: "Eve", UserAge: 22 });

    expect(await drain(body)).toBe('{"UserName":"Eve","UserAge":22}');
    expect(await drain(body)).toBe('{"UserName":"Eve","UserAge":22}');
    expect(body.json()).toEqual({ UserName: "Eve", UserAge: 22 });
    expect(body.length).toBe(31);
  });

  it("hands out copies of its bytes", () => {
    const source = Buffer.from("abc");
    const body = new RequestBody(source);
    source[0] = 0x7a;
    const copy = body.bytes();
    copy[1] = 0x7a;
    expect(body.text()).toBe("abc");
  });

  it("json() throws on empty or malformed input", () => {
    expect(new RequestBody().isEmpty()).toBe(true);
    expect(() => new RequestBody().json()).toThrow("Request body is empty");
    expect(() => RequestBody.fromText("{bad").json()).toThrow(SyntaxError);
  });
});

describe("RequestContext", () => {
  it("normalizes method and header names", () => {
    const ctx = makeCtx({
      method: "put",
      headers: { "X-Thing": ["a", "b"], Authorization: "t" },
      params: { name: "Bob" },
    });
    expect(ctx.method).toBe("PUT");
    expect(ctx.header("x-thing")).toBe("a, b");
    expect(ctx.header("AUTHORIZATION")).toBe("t");
    expect(ctx.hasHeader("cookie")).toBe(false);
    expect(ctx.param("name")).toBe("Bob");
    expect(() => ctx.param("id")).toThrow("Missing route param: id");
  });
});
