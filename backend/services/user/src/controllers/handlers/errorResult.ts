// backend/services/user/src/controllers/handlers/errorResult.ts
import {
  badRequest,
  notFound,
  type HttpResult,
} from "@userdir/shared/src/http/HttpResult";
import type { UserServiceError } from "../../services/userService";

/** Expected service failures → response. 404 carries no body. */
export function errorResult(error: UserServiceError): HttpResult {
  switch (error.kind) {
    case "validation":
    case "conflict":
      return badRequest(error.message);
    case "notFound":
      return notFound();
  }
}
