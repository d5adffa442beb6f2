// backend/services/user/src/routes/userRoutes.ts
import type { Router } from "express";
import type { RouteBinder } from "@userdir/shared/src/app/createServiceApp";
import type { UserService } from "../services/userService";

// 🔧 Direct handler imports (no barrels)
import { list } from "../controllers/handlers/list";
import { getByName } from "../controllers/handlers/getByName";
import { create } from "../controllers/handlers/create";
import { update } from "../controllers/handlers/update";
import { remove } from "../controllers/handlers/remove";

/**
 * Every route runs behind the request pipeline (errorHandling →
 * authentication → requestLogging); `pipe` does the wrapping.
 */
export function mountUserRoutes(
  router: Router,
  pipe: RouteBinder,
  svc: UserService
): void {
  router.get("/users", pipe(list(svc)));
  router.get("/users/:name", pipe(getByName(svc)));
  router.post("/users", pipe(create(svc)));
  router.put("/users/:name", pipe(update(svc)));
  router.delete("/users/:name", pipe(remove(svc)));
}
