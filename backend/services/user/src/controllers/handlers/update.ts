// backend/services/user/src/controllers/handlers/update.ts
import { noContent } from "@userdir/shared/src/http/HttpResult";
import type { RouteHandler } from "@userdir/shared/src/pipeline/Pipeline";
import type { UserService } from "../../services/userService";
import { bindUser } from "./bindUser";
import { errorResult } from "./errorResult";

// PUT /users/:name (name + age overwritten; rename moves the key)
export const update =
  (svc: UserService): RouteHandler =>
  (ctx) => {
    const name = ctx.param("name");
    const out = svc.updateUser(name, bindUser(ctx));
    if (!out.ok) return errorResult(out.error);

    ctx.log.debug(
      { reqId: ctx.requestId, from: name, to: out.value.UserName },
      "user updated"
    );
    return noContent();
  };
