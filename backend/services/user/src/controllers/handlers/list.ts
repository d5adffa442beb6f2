// backend/services/user/src/controllers/handlers/list.ts
import { ok } from "@userdir/shared/src/http/HttpResult";
import type { RouteHandler } from "@userdir/shared/src/pipeline/Pipeline";
import type { UserService } from "../../services/userService";

// GET /users
export const list =
  (svc: UserService): RouteHandler =>
  () =>
    ok(svc.listUsers());
