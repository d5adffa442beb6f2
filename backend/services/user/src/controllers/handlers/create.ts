// backend/services/user/src/controllers/handlers/create.ts
import { created } from "@userdir/shared/src/http/HttpResult";
import type { RouteHandler } from "@userdir/shared/src/pipeline/Pipeline";
import type { UserService } from "../../services/userService";
import { bindUser } from "./bindUser";
import { errorResult } from "./errorResult";

export const userLocation = (name: string): string =>
  `/users/${encodeURIComponent(name)}`;

// POST /users
export const create =
  (svc: UserService): RouteHandler =>
  (ctx) => {
    const out = svc.createUser(bindUser(ctx));
    if (!out.ok) return errorResult(out.error);

    ctx.log.debug({ reqId: ctx.requestId, user: out.value.UserName }, "user created");
    return created(userLocation(out.value.UserName), out.value);
  };
