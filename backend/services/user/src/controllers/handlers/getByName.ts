// backend/services/user/src/controllers/handlers/getByName.ts
import { ok } from "@userdir/shared/src/http/HttpResult";
import type { RouteHandler } from "@userdir/shared/src/pipeline/Pipeline";
import type { UserService } from "../../services/userService";
import { errorResult } from "./errorResult";

// GET /users/:name
export const getByName =
  (svc: UserService): RouteHandler =>
  (ctx) => {
    const out = svc.getUser(ctx.param("name"));
    return out.ok ? ok(out.value) : errorResult(out.error);
  };
