// backend/services/user/src/app.ts
/**
 * Why:
 * - Assemble the user directory on the shared builder. The pipeline is
 *   fixed here, outer → inner:
 *     errorHandling → authentication → requestLogging → route handler
 * - The store is injected, so tests (and index.ts) own their instance.
 */

import type { Express } from "express";
import type { Logger } from "pino";
import { createServiceApp } from "@userdir/shared/src/app/createServiceApp";
import { Pipeline } from "@userdir/shared/src/pipeline/Pipeline";
import { errorHandling } from "@userdir/shared/src/middleware/errorHandling";
import {
  authentication,
  type AuthenticationOptions,
} from "@userdir/shared/src/middleware/authentication";
import { requestLogging } from "@userdir/shared/src/middleware/requestLogging";
import { UserStore } from "./repo/userStore";
import { UserService } from "./services/userService";
import { mountUserRoutes } from "./routes/userRoutes";

export type UserAppDeps = {
  serviceName: string;
  store: UserStore;
  auth: AuthenticationOptions;
  logger?: Logger;
  bodyLimit?: string;
};

export function buildUserPipeline(auth: AuthenticationOptions): Pipeline {
  return new Pipeline("user")
    .use(errorHandling())
    .use(authentication(auth))
    .use(requestLogging())
    .seal();
}

export function createUserApp(deps: UserAppDeps): Express {
  const svc = new UserService(deps.store);

  return createServiceApp({
    serviceName: deps.serviceName,
    pipeline: buildUserPipeline(deps.auth),
    mountRoutes: (router, pipe) => mountUserRoutes(router, pipe, svc),
    readiness: () => ({ users: deps.store.size }),
    logger: deps.logger,
    bodyLimit: deps.bodyLimit,
  });
}

export { UserStore, UserService };
