// backend/services/user/src/controllers/handlers/bindUser.ts
import type { RequestContext } from "@userdir/shared/src/http/RequestContext";
import { zUser, type User } from "../../contracts/user.contract";

/**
 * JSON body → User. Malformed JSON or a wrong shape throws; inside the
 * pipeline that is an unexpected fault (500 at the error boundary).
 */
export function bindUser(ctx: RequestContext): User {
  return zUser.parse(ctx.body.json());
}
