// backend/services/user/src/contracts/user.contract.ts
/**
 * Purpose:
 * - Canonical wire shape of a directory user. Field names are the public
 *   contract (`UserName`, `UserAge`) and must not change.
 *
 * Notes:
 * - `zUser` is SHAPE binding only (types, integer age). Business rules
 *   (length, whitespace, age range) live in validators/userValidator.ts so a
 *   well-shaped but invalid user gets a 400, not a binding fault.
 */

import { z } from "zod";

export const zUser = z.object({
  UserName: z.string(),
  UserAge: z.number().int(),
});

export type User = z.infer<typeof zUser>;
