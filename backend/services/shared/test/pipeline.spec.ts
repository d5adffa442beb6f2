// backend/services/shared/test/pipeline.spec.ts
import { describe, it, expect } from "vitest";
import { Pipeline, compose, type PipelineStage } from "../src/pipeline/Pipeline";
import { ok, noContent, type HttpResult } from "../src/http/HttpResult";
import { makeCtx } from "./helpers/context";

function tracing(name: string, trace: string[]): PipelineStage {
  return {
    name,
    handle: async (_ctx, next) => {
      trace.push(`${name}:in`);
      const r = await next();
      trace.push(`${name}:out`);
      return r;
    },
  };
}

describe("Pipeline ordering", () => {
  it("runs stages outer → inner, then unwinds inner → outer", async () => {
    const trace: string[] = [];
    const run = new Pipeline("t")
      .use(tracing("a", trace))
      .use(tracing("b", trace))
      .use(tracing("c", trace))
      .handler(() => {
        trace.push("route");
        return ok("done");
      });

    const res = await run(makeCtx());

    expect(res).toEqual({ status: 200, body: "done" });
    expect(trace).toEqual(["a:in", "b:in", "c:in", "route", "c:out", "b:out", "a:out"]);
  });

  it("a short-circuiting stage skips inner stages and the route", async () => {
    const trace: string[] = [];
    const gate: PipelineStage = {
      name: "gate",
      handle: async () => ({ status: 401, body: { error: "no" } }),
    };
    const run = new Pipeline("t")
      .use(tracing("outer", trace))
      .use(gate)
      .use(tracing("inner", trace))
      .handler(() => {
        trace.push("route");
        return noContent();
      });

    const res = await run(makeCtx());

    expect(res.status).toBe(401);
    expect(trace).toEqual(["outer:in", "outer:out"]);
  });

  it("records the result on ctx.response as it passes back out", async () => {
    let seenByOuter: HttpResult | undefined;
    const outer: PipelineStage = {
      name: "outer",
      handle: async (ctx, next) => {
        await next();
        seenByOuter = ctx.response;
        return { status: 202 };
      },
    };
    const ctx = makeCtx();

    await new Pipeline("t").use(outer).handler(() => ok(1))(ctx);

    expect(seenByOuter).toEqual({ status: 200, body: 1 });
    expect(ctx.response).toEqual({ status: 202 });
  });

  it("an empty stage list calls the route directly", async () => {
    const res = await compose([], () => ok([]))(makeCtx());
    expect(res).toEqual({ status: 200, body: [] });
  });

  it("rejects when a stage calls next twice", async () => {
    const twice: PipelineStage = {
      name: "twice",
      handle: async (_ctx, next) => {
        await next();
        return next();
      },
    };
    const run = new Pipeline("t").use(twice).handler(() => noContent());

    await expect(run(makeCtx())).rejects.toThrow(
      "next() called multiple times (stage=twice)"
    );
  });
});

describe("Pipeline plan", () => {
  const stage = (name: string): PipelineStage => ({
    name,
    handle: (_ctx, next) => next(),
  });

  it("lists stage names in registration order", () => {
    const p = new Pipeline("user").use(stage("x")).use(stage("y"));
    expect(p.stageNames()).toEqual(["x", "y"]);
    expect(p.pipelineName()).toBe("user");
  });

  it("refuses duplicates and blank names", () => {
    const p = new Pipeline("user").use(stage("x"));
    expect(() => p.use(stage("x"))).toThrow(
      'PIPELINE_PLAN_INVALID: duplicate stage "x" (pipeline=user).'
    );
    expect(() => p.use(stage("  "))).toThrow(
      "PIPELINE_PLAN_INVALID: stage name is blank (pipeline=user)."
    );
    expect(() => new Pipeline(" ")).toThrow(
      "PIPELINE_PLAN_INVALID: pipeline name is blank."
    );
  });

  it("is sealed once a handler is bound", () => {
    const p = new Pipeline("user").use(stage("x"));
    expect(p.isSealed()).toBe(false);

    p.handler(() => noContent());

    expect(p.isSealed()).toBe(true);
    expect(() => p.use(stage("late"))).toThrow(
      'PIPELINE_SEALED: cannot add stage "late" after startup (pipeline=user).'
    );
  });
});
