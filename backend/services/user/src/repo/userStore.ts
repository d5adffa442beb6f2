// backend/services/user/src/repo/userStore.ts
/**
 * Purpose:
 * - In-memory directory: case-insensitive username → user record.
 * - Owned by the app and injected into the service; no module-level state.
 *
 * Concurrency:
 * - Every method is synchronous and never awaits, so each one runs to
 *   completion on the event loop before any other request is served.
 *   Check-then-insert, remove and replace are therefore atomic.
 *
 * Notes:
 * - Callers only ever get copies. The stored objects never leave this class.
 * - `replace()` re-keys on rename, so the key always equals the record's
 *   own (case-folded) UserName.
 */

import type { User } from "../contracts/user.contract";

export type ReplaceOutcome =
  | { user: User }
  | { notFound: true }
  | { conflict: true };

const copy = (u: User): User => ({ UserName: u.UserName, UserAge: u.UserAge });

export class UserStore {
  readonly #users = new Map<string, User>();

  /** Case-insensitive key. */
  public static keyOf(name: string): string {
    return name.toLowerCase();
  }

  public get size(): number {
    return this.#users.size;
  }

  /** Snapshot; order not guaranteed. */
  public list(): User[] {
    return Array.from(this.#users.values(), copy);
  }

  public get(name: string): User | undefined {
    const hit = this.#users.get(UserStore.keyOf(name));
    return hit ? copy(hit) : undefined;
  }

  public has(name: string): boolean {
    return this.#users.has(UserStore.keyOf(name));
  }

  /** False if the key is already taken; never overwrites. */
  public insert(name: string, user: User): boolean {
    const key = UserStore.keyOf(name);
    if (this.#users.has(key)) return false;
    this.#users.set(key, copy(user));
    return true;
  }

  public remove(name: string): boolean {
    return this.#users.delete(UserStore.keyOf(name));
  }

  /**
   * Overwrite name and age of the record under `name`.
   * - absent → notFound
   * - new name held by a different record → conflict (nothing changes)
   */
  public replace(name: string, fields: User): ReplaceOutcome {
    const key = UserStore.keyOf(name);
    const existing = this.#users.get(key);
    if (!existing) return { notFound: true };

    const newKey = UserStore.keyOf(fields.UserName);
    if (newKey !== key && this.#users.has(newKey)) return { conflict: true };

    existing.UserName = fields.UserName;
    existing.UserAge = fields.UserAge;
    if (newKey !== key) {
      this.#users.delete(key);
      this.#users.set(newKey, existing);
    }
    return { user: copy(existing) };
  }

  /** Bulk insert; returns how many were added (existing keys are skipped). */
  public seed(users: readonly User[]): number {
    return users.filter((u) => this.insert(u.UserName, u)).length;
  }
}
