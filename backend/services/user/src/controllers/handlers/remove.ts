// backend/services/user/src/controllers/handlers/remove.ts
import { noContent } from "@userdir/shared/src/http/HttpResult";
import type { RouteHandler } from "@userdir/shared/src/pipeline/Pipeline";
import type { UserService } from "../../services/userService";
import { errorResult } from "./errorResult";

// DELETE /users/:name
export const remove =
  (svc: UserService): RouteHandler =>
  (ctx) => {
    const out = svc.removeUser(ctx.param("name"));
    return out.ok ? noContent() : errorResult(out.error);
  };
