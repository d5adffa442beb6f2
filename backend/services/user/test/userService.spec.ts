// backend/services/user/test/userService.spec.ts
import { describe, it, expect } from "vitest";
import { UserStore } from "../src/repo/userStore";
import { UserService, DUPLICATE_USER_MESSAGE } from "../src/services/userService";
import { SEED_USERS } from "../src/seed";

function service() {
  const store = new UserStore();
  store.seed(SEED_USERS);
  return { store, svc: new UserService(store) };
}

describe("UserService", () => {
  it("getUser: found or notFound", () => {
    const { svc } = service();
    expect(svc.getUser("charlie")).toEqual({
      ok: true,
      value: { UserName: "Charlie", UserAge: 35 },
    });
    expect(svc.getUser("nobody")).toEqual({
      ok: false,
      error: { kind: "notFound", name: "nobody" },
    });
  });

  it("createUser validates before touching the store", () => {
    const { svc, store } = service();
    const out = svc.createUser({ UserName: "Da", UserAge: 20 });
    expect(out.ok).toBe(false);
    expect(store.has("Da")).toBe(false);
  });

  it("createUser rejects a case-insensitive duplicate", () => {
    const { svc } = service();
    expect(svc.createUser({ UserName: "ALICE", UserAge: 40 })).toEqual({
      ok: false,
      error: { kind: "conflict", name: "ALICE", message: DUPLICATE_USER_MESSAGE },
    });
  });

  it("createUser stores and returns the user", () => {
    const { svc, store } = service();
    expect(svc.createUser({ UserName: "Dave", UserAge: 40 })).toEqual({
      ok: true,
      value: { UserName: "Dave", UserAge: 40 },
    });
    expect(store.size).toBe(4);
  });

  it("updateUser: validation first, then notFound, then conflict", () => {
    const { svc, store } = service();
    const bad = svc.updateUser("Nobody", { UserName: "x y z", UserAge: 3 });
    expect(bad.ok ? null : bad.error.kind).toBe("validation");

    const before = store.list();
    const missing = svc.updateUser("Nobody", { UserName: "Alice", UserAge: 3 });
    expect(missing).toEqual({ ok: false, error: { kind: "notFound", name: "Nobody" } });
    expect(store.list()).toEqual(before);

    const clash = svc.updateUser("Alice", { UserName: "Charlie", UserAge: 3 });
    expect(clash.ok ? null : clash.error.kind).toBe("conflict");
  });

  it("removeUser", () => {
    const { svc } = service();
    expect(svc.removeUser("bob")).toEqual({ ok: true, value: null });
    expect(svc.removeUser("bob")).toEqual({
      ok: false,
      error: { kind: "notFound", name: "bob" },
    });
  });
});
