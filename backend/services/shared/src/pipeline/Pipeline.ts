// backend/services/shared/src/pipeline/Pipeline.ts
/**
 * Purpose:
 * - Ordered request pipeline: stages wrap a route handler, continuation style.
 *   A stage receives the context and `next`; it may answer on its own
 *   (short-circuit), or call `next` once and observe what comes back.
 *
 * Ordering:
 * - Stages are registered outer → inner. The first registered runs first on
 *   the way in and last on the way out.
 *
 * Critical invariants:
 * - The stage list is fixed at startup. `seal()` (or the first `handler()`)
 *   freezes it; a later `use()` throws.
 * - `next` may be called at most once per stage per request.
 * - Stage names are non-blank and unique (they show up in logs).
 */

import type { HttpResult } from "../http/HttpResult";
import type { RequestContext } from "../http/RequestContext";

export type Next = () => Promise<HttpResult>;

export type Middleware = (ctx: RequestContext, next: Next) => Promise<HttpResult>;

export type RouteHandler = (
  ctx: RequestContext
) => Promise<HttpResult> | HttpResult;

/** Bound, runnable chain: stages + terminal route handler. */
export type ComposedHandler = (ctx: RequestContext) => Promise<HttpResult>;

export type PipelineStage = {
  name: string;
  handle: Middleware;
};

/**
 * Compose stages around a terminal handler. Every result passing back out of a
 * stage is recorded on `ctx.response`.
 */
export function compose(
  stages: readonly PipelineStage[],
  terminal: RouteHandler
): ComposedHandler {
  return (ctx) => {
    let lastIndex = -1;

    const dispatch = async (i: number): Promise<HttpResult> => {
      if (i <= lastIndex) {
        throw new Error(
          `next() called multiple times (stage=${stages[i - 1]?.name ?? "?"})`
        );
      }
      lastIndex = i;

      const stage = stages[i];
      const result = stage
        ? await stage.handle(ctx, () => dispatch(i + 1))
        : await terminal(ctx);
      ctx.response = result;
      return result;
    };

    return dispatch(0);
  };
}

export class Pipeline {
  readonly #name: string;
  readonly #stages: PipelineStage[] = [];
  #sealed = false;

  constructor(name: string) {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new Error("PIPELINE_PLAN_INVALID: pipeline name is blank.");
    }
    this.#name = trimmed;
  }

  public pipelineName(): string {
    return this.#name;
  }

  /** Register the next (inner) stage. Startup only. */
  public use(stage: PipelineStage): this {
    if (this.#sealed) {
      throw new Error(
        `PIPELINE_SEALED: cannot add stage "${stage.name}" after startup (pipeline=${this.#name}).`
      );
    }
    const name = stage.name.trim();
    if (!name) {
      throw new Error(
        `PIPELINE_PLAN_INVALID: stage name is blank (pipeline=${this.#name}).`
      );
    }
    if (this.#stages.some((s) => s.name === name)) {
      throw new Error(
        `PIPELINE_PLAN_INVALID: duplicate stage "${name}" (pipeline=${this.#name}).`
      );
    }
    this.#stages.push({ name, handle: stage.handle });
    return this;
  }

  public seal(): this {
    this.#sealed = true;
    return this;
  }

  public isSealed(): boolean {
    return this.#sealed;
  }

  /** Stage names, outer → inner. */
  public stageNames(): string[] {
    return this.#stages.map((s) => s.name);
  }

  /** Bind the (sealed) stage list around a route handler. */
  public handler(route: RouteHandler): ComposedHandler {
    this.seal();
    return compose([...this.#stages], route);
  }
}
