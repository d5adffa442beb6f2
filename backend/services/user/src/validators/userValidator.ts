// backend/services/user/src/validators/userValidator.ts
import type { User } from "../contracts/user.contract";

export const MIN_NAME_LENGTH = 3;
export const MIN_AGE = 0;
export const MAX_AGE = 120;

export type ValidationErrorCode =
  | "NameEmpty"
  | "NameTooShort"
  | "NameContainsWhitespace"
  | "AgeOutOfRange";

export type ValidationError = {
  kind: "validation";
  code: ValidationErrorCode;
  message: string;
};

export type ValidationResult =
  | { ok: true }
  | { ok: false; error: ValidationError };

const NAME_LENGTH_MESSAGE = `UserName must be at least ${MIN_NAME_LENGTH} characters long and cannot be empty.`;

const MESSAGES: Record<ValidationErrorCode, string> = {
  NameEmpty: NAME_LENGTH_MESSAGE,
  NameTooShort: NAME_LENGTH_MESSAGE,
  NameContainsWhitespace: "UserName cannot contain spaces.",
  AgeOutOfRange: `UserAge must be between ${MIN_AGE} and ${MAX_AGE}.`,
};

const fail = (code: ValidationErrorCode): ValidationResult => ({
  ok: false,
  error: { kind: "validation", code, message: MESSAGES[code] },
});

/** Same rules for create and update; first failing rule wins. */
export function validateUser(candidate: User): ValidationResult {
  const name = candidate.UserName;
  const trimmed = name.trim();

  if (trimmed.length === 0) return fail("NameEmpty");
  if (trimmed.length < MIN_NAME_LENGTH) return fail("NameTooShort");
  if (/\s/.test(name)) return fail("NameContainsWhitespace");
  if (candidate.UserAge < MIN_AGE || candidate.UserAge > MAX_AGE)
    return fail("AgeOutOfRange");

  return { ok: true };
}
