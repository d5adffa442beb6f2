// backend/services/user/test/userValidator.spec.ts
import { describe, it, expect } from "vitest";
import { validateUser } from "../src/validators/userValidator";

const LENGTH = "UserName must be at least 3 characters long and cannot be empty.";

describe("validateUser", () => {
  it("accepts the boundaries", () => {
    expect(validateUser({ UserName: "Ann", UserAge: 0 })).toEqual({ ok: true });
    expect(validateUser({ UserName: "Ann", UserAge: 120 })).toEqual({ ok: true });
  });

  it.each([
    ["", 30, "NameEmpty", LENGTH],
    ["   ", 30, "NameEmpty", LENGTH],
    ["Da", 30, "NameTooShort", LENGTH],
    [" Da ", 30, "NameTooShort", LENGTH],
    ["Da vid", 30, "NameContainsWhitespace", "UserName cannot contain spaces."],
    [" David", 30, "NameContainsWhitespace", "UserName cannot contain spaces."],
    ["David", -5, "AgeOutOfRange", "UserAge must be between 0 and 120."],
    ["David", 121, "AgeOutOfRange", "UserAge must be between 0 and 120."],
  ])("%j / %d → %s", (UserName, UserAge, code, message) => {
    expect(validateUser({ UserName, UserAge })).toEqual({
      ok: false,
      error: { kind: "validation", code, message },
    });
  });

  it("reports the name before the age", () => {
    const out = validateUser({ UserName: "Da", UserAge: 500 });
    expect(out.ok ? null : out.error.code).toBe("NameTooShort");
  });
});
