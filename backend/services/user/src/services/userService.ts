// backend/services/user/src/services/userService.ts
/**
 * Purpose:
 * - Directory operations over an injected UserStore.
 * - Expected failures come back as tagged errors (never thrown):
 *     validation → 400, conflict → 400, notFound → 404.
 */

import type { User } from "../contracts/user.contract";
import type { UserStore } from "../repo/userStore";
import {
  validateUser,
  type ValidationError,
} from "../validators/userValidator";

export const DUPLICATE_USER_MESSAGE =
  "A user with the same username already exists.";

export type NotFoundError = { kind: "notFound"; name: string };
export type ConflictError = { kind: "conflict"; name: string; message: string };

export type UserServiceError = ValidationError | NotFoundError | ConflictError;

export type ServiceResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: UserServiceError };

const success = <T>(value: T): ServiceResult<T> => ({ ok: true, value });
const failure = <T>(error: UserServiceError): ServiceResult<T> => ({
  ok: false,
  error,
});
const notFound = (name: string): NotFoundError => ({ kind: "notFound", name });
const conflict = (name: string): ConflictError => ({
  kind: "conflict",
  name,
  message: DUPLICATE_USER_MESSAGE,
});

export class UserService {
  constructor(private readonly store: UserStore) {}

  public listUsers(): User[] {
    return this.store.list();
  }

  public getUser(name: string): ServiceResult<User> {
    const user = this.store.get(name);
    return user ? success(user) : failure(notFound(name));
  }

  public createUser(candidate: User): ServiceResult<User> {
    const checked = validateUser(candidate);
    if (!checked.ok) return failure(checked.error);

    if (!this.store.insert(candidate.UserName, candidate)) {
      return failure(conflict(candidate.UserName));
    }
    return success({ ...candidate });
  }

  public updateUser(name: string, candidate: User): ServiceResult<User> {
    const checked = validateUser(candidate);
    if (!checked.ok) return failure(checked.error);

    const out = this.store.replace(name, candidate);
    if ("notFound" in out) return failure(notFound(name));
    if ("conflict" in out) return failure(conflict(candidate.UserName));
    return success(out.user);
  }

  public removeUser(name: string): ServiceResult<null> {
    return this.store.remove(name) ? success(null) : failure(notFound(name));
  }
}
